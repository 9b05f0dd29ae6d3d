/**
 * Manual rating overlay for archived items.
 * Human ratings are merged per dimension into appendix.manual_rating;
 * the AI rating mapping is never touched.
 */

import type { IIntelligenceRepository } from '../repositories/IIntelligenceRepository.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { ManualRatingResponse } from '../types/api.js';
import { NotFoundError, ValidationError } from '../errors.js';
import { describeIssues, manualRatingSchema } from '../schemas.js';

export class ManualRatingService {
  private readonly now: () => Date;

  constructor(
    private readonly intelligenceRepo: IIntelligenceRepository,
    private readonly logger: ILogProvider,
    options?: { now?: () => Date }
  ) {
    this.now = options?.now ?? (() => new Date());
  }

  /**
   * Any out-of-range or malformed value rejects the whole submission
   * before anything is written.
   */
  async submit(input: unknown): Promise<ManualRatingResponse> {
    const parsed = manualRatingSchema.safeParse(input);
    if (!parsed.success) {
      throw new ValidationError('Invalid manual rating', {
        issues: describeIssues(parsed.error),
      });
    }
    const { uuid, ratings, timestamp } = parsed.data;

    const located = await this.intelligenceRepo.findByUuid(uuid);
    if (!located || located.partition !== 'archived') {
      throw new NotFoundError(`Archived intelligence "${uuid}" not found`);
    }

    const updatedAt = timestamp
      ? new Date(timestamp).toISOString()
      : this.now().toISOString();
    const row = await this.intelligenceRepo.mergeManualRating(uuid, ratings, updatedAt);
    if (!row) {
      throw new NotFoundError(`Archived intelligence "${uuid}" not found`);
    }

    this.logger.info('Manual rating saved', {
      uuid,
      dimensions: Object.keys(ratings),
    });

    return {
      uuid,
      manualRating: row.appendix.manual_rating ?? {},
      updatedAt,
    };
  }
}
