/**
 * Structured logging seam.
 * Services log through ILogProvider; the container picks the sink.
 */

/** Least to most severe. */
export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogFields = Record<string, unknown>;

/** True when `level` is at or above `minLevel`. */
export function meetsLevel(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(minLevel);
}

export interface LogEvent {
  level: LogLevel;
  message: string;
  /** ISO-8601; providers stamp it when omitted. */
  timestamp?: string;
  fields?: LogFields;
}

export interface ILogProvider {
  log(event: LogEvent): void;

  /** Resolves once buffered events have been handed to the sink, or the attempt failed. */
  flush(): Promise<void>;

  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}
