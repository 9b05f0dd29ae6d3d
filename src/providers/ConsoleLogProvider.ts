/**
 * Console log provider.
 * Keeps the most recent events in memory (tests read them back) and can
 * write each one as a JSON line: debug/info to stdout, warn/error to stderr.
 */

import { BaseLogProvider, type StampedLogEvent } from './BaseLogProvider.js';
import type { LogEvent, LogLevel } from './ILogProvider.js';

export interface ConsoleLogProviderOptions {
  /** Write events as JSON lines. Default: false. */
  outputToConsole?: boolean;
  /** Default: 'debug'. */
  minLevel?: LogLevel;
  /** How many recent events `events` retains. Default: 1000. */
  retain?: number;
}

export class ConsoleLogProvider extends BaseLogProvider {
  /** Retained events, oldest first. */
  readonly events: LogEvent[] = [];

  private readonly outputToConsole: boolean;
  private readonly retain: number;

  constructor(options?: ConsoleLogProviderOptions) {
    super(options?.minLevel);
    this.outputToConsole = options?.outputToConsole ?? false;
    this.retain = options?.retain ?? 1000;
  }

  protected deliver(event: StampedLogEvent): void {
    if (this.retain > 0) {
      this.events.push(event);
      if (this.events.length > this.retain) this.events.shift();
    }
    if (!this.outputToConsole) return;

    const { fields, ...head } = event;
    const line = `${JSON.stringify({ ...head, ...fields })}\n`;
    const stream = event.level === 'warn' || event.level === 'error' ? process.stderr : process.stdout;
    stream.write(line);
  }

  async flush(): Promise<void> {
    // Writes are synchronous.
  }

  find(message: string): LogEvent[] {
    return this.events.filter((e) => e.message === message);
  }

  clear(): void {
    this.events.length = 0;
  }
}
