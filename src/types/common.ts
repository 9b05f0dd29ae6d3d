/**
 * Shared utility types.
 */

export interface PaginationOptions {
  limit: number;
  offset: number;
}

/** Inclusive ISO-8601 time range. Either end may be open. */
export interface TimeRange {
  start?: string;
  end?: string;
}
