/**
 * Typed application errors.
 * Every error carries a machine-readable code and the HTTP status the API maps it to.
 */

export class AppError extends Error {
  constructor(
    readonly code: string,
    message: string,
    readonly statusCode: number,
    readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
  }
}

// ── Request errors ──

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_REQUEST', message, 400, details);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super('NOT_FOUND', message, 404);
  }
}

export class ConflictError extends AppError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, 409, details);
  }
}

// ── Pipeline errors ──

/** Unreachable or malformed feed record. Logged and skipped. */
export class IngestionError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INGESTION_ERROR', message, 422, details);
  }
}

/** The item was already fingerprinted. Not a failure. */
export class DuplicateError extends ConflictError {
  constructor(readonly fingerprint: string) {
    super('DUPLICATE_ITEM', 'Item has already been ingested', { fingerprint });
  }
}

/** Timeout, rate limit or transport failure talking to the AI service. Retryable. */
export class AIProviderError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('AI_PROVIDER_ERROR', message, 502, details);
  }
}

/** Malformed or out-of-range AI output. Retryable, same as a provider failure. */
export class ParseError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('PARSE_ERROR', message, 502, details);
  }
}

/**
 * Unexpected write conflict on an item the caller believed it held exclusively.
 * Signals a broken at-most-one-claim guarantee; never retried.
 */
export class StorageError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('STORAGE_ERROR', message, 500, details);
  }
}

/** AI-provider and parse failures follow the bounded retry policy. */
export function isRetryableClassificationError(
  err: unknown
): err is AIProviderError | ParseError {
  return err instanceof AIProviderError || err instanceof ParseError;
}

/** HTTP status carried by an SDK or fetch error, when it has one. */
export function httpStatusOf(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'status' in err) {
    return typeof err.status === 'number' ? err.status : undefined;
  }
  return undefined;
}
