/**
 * Shared front half of the log providers: level filtering, timestamping
 * and the convenience methods. Subclasses deliver stamped events.
 */

import { meetsLevel, type ILogProvider, type LogEvent, type LogFields, type LogLevel } from './ILogProvider.js';

export type StampedLogEvent = LogEvent & { timestamp: string };

export abstract class BaseLogProvider implements ILogProvider {
  protected constructor(private readonly minLevel: LogLevel = 'debug') {}

  log(event: LogEvent): void {
    if (!meetsLevel(event.level, this.minLevel)) return;
    this.deliver({ ...event, timestamp: event.timestamp ?? new Date().toISOString() });
  }

  abstract flush(): Promise<void>;

  protected abstract deliver(event: StampedLogEvent): void;

  debug(message: string, fields?: LogFields): void {
    this.log({ level: 'debug', message, fields });
  }

  info(message: string, fields?: LogFields): void {
    this.log({ level: 'info', message, fields });
  }

  warn(message: string, fields?: LogFields): void {
    this.log({ level: 'warn', message, fields });
  }

  error(message: string, fields?: LogFields): void {
    this.log({ level: 'error', message, fields });
  }
}
