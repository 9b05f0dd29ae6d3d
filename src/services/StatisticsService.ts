/**
 * Archive statistics over archive time: the distribution of max ratings,
 * item counts per hour/day/week/month, and a summary with the busiest informants.
 */

import type { CountBucket, IIntelligenceRepository } from '../repositories/IIntelligenceRepository.js';
import type {
  PeriodCountsResponse,
  ScoreDistributionResponse,
  StatisticsSummaryResponse,
  StatisticsTimeRange,
} from '../types/api.js';
import { ValidationError } from '../errors.js';
import {
  describeIssues,
  scoreDistributionParamsSchema,
  statisticsPeriodSchema,
  statisticsRangeSchema,
} from '../schemas.js';

const DEFAULT_WINDOW_MS = 24 * 60 * 60 * 1000;
const TOP_INFORMANTS = 10;

export class StatisticsService {
  private readonly now: () => Date;

  constructor(
    private readonly intelligenceRepo: IIntelligenceRepository,
    options?: { now?: () => Date }
  ) {
    this.now = options?.now ?? (() => new Date());
  }

  /** Both ends of the range are required here. */
  async scoreDistribution(params: unknown): Promise<ScoreDistributionResponse> {
    const parsed = scoreDistributionParamsSchema.safeParse(params);
    if (!parsed.success) {
      throw new ValidationError('start and end must both be ISO-8601 dates', {
        issues: describeIssues(parsed.error),
      });
    }
    const timeRange = checkOrder(parsed.data);

    const buckets = await this.intelligenceRepo.countArchived(timeRange, 'score');
    const chartData = buckets
      .map((b) => ({ score: Number(b.key), count: b.count }))
      .sort((a, b) => a.score - b.score);

    return {
      timeRange,
      distribution: Object.fromEntries(chartData.map((d) => [String(d.score), d.count])),
      chartData,
      totalRecords: total(buckets),
    };
  }

  /** Counts per period. The range defaults to the last 24 hours. */
  async countsByPeriod(period: unknown, params: unknown): Promise<PeriodCountsResponse> {
    const unit = statisticsPeriodSchema.safeParse(period);
    if (!unit.success) {
      throw new ValidationError(`Unknown statistics period "${String(period)}"`, {
        allowed: statisticsPeriodSchema.options,
      });
    }
    const timeRange = this.parseRange(params);

    const buckets = await this.intelligenceRepo.countArchived(timeRange, unit.data);
    return {
      period: unit.data,
      timeRange,
      buckets: buckets.map((b) => ({ start: b.key, count: b.count })),
      total: total(buckets),
    };
  }

  async summary(params: unknown): Promise<StatisticsSummaryResponse> {
    const timeRange = this.parseRange(params);
    const buckets = await this.intelligenceRepo.countArchived(timeRange, 'informant');

    const topInformants = buckets
      .map((b) => ({ informant: b.key, count: b.count }))
      .sort((a, b) => b.count - a.count || a.informant.localeCompare(b.informant))
      .slice(0, TOP_INFORMANTS);

    return { totalCount: total(buckets), timeRange, topInformants };
  }

  // ── Private ──

  private parseRange(params: unknown): StatisticsTimeRange {
    const parsed = statisticsRangeSchema.safeParse(params);
    if (!parsed.success) {
      throw new ValidationError('Invalid statistics range', {
        issues: describeIssues(parsed.error),
      });
    }
    const end = parsed.data.end ?? this.now().toISOString();
    const start =
      parsed.data.start ?? new Date(Date.parse(end) - DEFAULT_WINDOW_MS).toISOString();
    return checkOrder({ start, end });
  }
}

function checkOrder(range: StatisticsTimeRange): StatisticsTimeRange {
  if (range.start > range.end) {
    throw new ValidationError('start must not be after end');
  }
  return range;
}

function total(buckets: CountBucket[]): number {
  return buckets.reduce((sum, b) => sum + b.count, 0);
}
