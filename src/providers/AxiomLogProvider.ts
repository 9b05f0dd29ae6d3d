/**
 * Axiom log provider.
 * Events are flattened to Axiom rows ({ _time, level, message, service, ...fields })
 * and posted in batches to the dataset ingest endpoint. A failed batch stays
 * buffered for the next flush. Without an API token the provider drops everything.
 */

import { BaseLogProvider, type StampedLogEvent } from './BaseLogProvider.js';
import type { LogLevel } from './ILogProvider.js';

export interface AxiomLogProviderOptions {
  /** Empty disables delivery. */
  apiToken: string;
  dataset: string;
  /** Added to every row as `service`. */
  service?: string;
  /** Default: 'debug'. */
  minLevel?: LogLevel;
  /** Rows buffered before an automatic flush. Default: 50. */
  flushThreshold?: number;
  /** Timer flush period; 0 disables the timer. Default: 10_000. */
  flushIntervalMs?: number;
  /** Oldest rows are dropped past this size. Default: 5_000. */
  maxBufferSize?: number;
}

type AxiomRow = Record<string, unknown> & { _time: string };

const INGEST_BASE_URL = 'https://api.axiom.co/v1/datasets';

export class AxiomLogProvider extends BaseLogProvider {
  /** Last delivery failure; null after a successful flush. */
  lastFlushError: string | null = null;

  private readonly rows: AxiomRow[] = [];
  private readonly ingestUrl: string;
  private readonly enabled: boolean;
  private readonly flushThreshold: number;
  private readonly maxBufferSize: number;
  private timer: ReturnType<typeof setInterval> | null = null;
  private pending: Promise<void> | null = null;

  constructor(private readonly options: AxiomLogProviderOptions) {
    super(options.minLevel);
    this.ingestUrl = `${INGEST_BASE_URL}/${encodeURIComponent(options.dataset)}/ingest`;
    this.enabled = options.apiToken.length > 0;
    this.flushThreshold = options.flushThreshold ?? 50;
    this.maxBufferSize = options.maxBufferSize ?? 5_000;

    const interval = options.flushIntervalMs ?? 10_000;
    if (this.enabled && interval > 0) {
      this.timer = setInterval(() => void this.flush(), interval);
      this.timer.unref();
    }
  }

  protected deliver(event: StampedLogEvent): void {
    if (!this.enabled) return;

    this.rows.push({
      _time: event.timestamp,
      level: event.level,
      message: event.message,
      ...(this.options.service && { service: this.options.service }),
      ...event.fields,
    });
    const overflow = this.rows.length - this.maxBufferSize;
    if (overflow > 0) this.rows.splice(0, overflow);

    if (this.rows.length >= this.flushThreshold) void this.flush();
  }

  /** Concurrent callers share the request in flight. */
  flush(): Promise<void> {
    if (this.pending) return this.pending;
    if (!this.enabled || this.rows.length === 0) return Promise.resolve();

    this.pending = this.post(this.rows.length).finally(() => {
      this.pending = null;
    });
    return this.pending;
  }

  /** Stop the timer and deliver what is left. */
  async dispose(): Promise<void> {
    if (this.timer) clearInterval(this.timer);
    this.timer = null;
    await this.flush();
  }

  private async post(count: number): Promise<void> {
    try {
      const res = await fetch(this.ingestUrl, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.options.apiToken}`,
        },
        body: JSON.stringify(this.rows.slice(0, count)),
      });
      if (!res.ok) {
        this.lastFlushError = `Axiom ingest failed with status ${res.status}`;
        return;
      }
      this.rows.splice(0, count);
      this.lastFlushError = null;
    } catch (err) {
      this.lastFlushError = err instanceof Error ? err.message : String(err);
    }
  }
}
