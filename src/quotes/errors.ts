/**
 * Error raised by every QuoteStore operation that cannot complete.
 *
 * The underlying Supabase/PostgREST error, if any, is kept as `cause` so the
 * caller can log it without showing it to the user.
 */

export type StoreErrorCode = "invalid_input" | "query_failed" | "contention";

export class StoreError extends Error {
  constructor(
    public readonly operation: string,
    public readonly code: StoreErrorCode,
    message: string,
    cause?: unknown
  ) {
    super(`QuoteStore.${operation}: ${message}`, { cause });
    this.name = "StoreError";
  }
}

/**
 * Minimal view of a PostgREST error as returned by supabase-js.
 */
export interface PostgrestLikeError {
  message: string;
  code?: string;
}

export function queryFailed(operation: string, error: PostgrestLikeError): StoreError {
  return new StoreError(operation, "query_failed", error.message, error);
}

export function isStoreError(error: unknown): error is StoreError {
  return error instanceof StoreError;
}
