/**
 * Store Errors
 * Raised by the database adapters; the services translate them to Results.
 */

/**
 * A unique constraint rejected the write (PostgreSQL 23505)
 */
export class DuplicateKeyError extends Error {
  constructor(
    message: string,
    public readonly constraint?: string
  ) {
    super(message);
    this.name = 'DuplicateKeyError';
  }
}

/**
 * Any other store-level failure
 */
export class StoreError extends Error {
  constructor(
    message: string,
    public readonly code?: string
  ) {
    super(message);
    this.name = 'StoreError';
  }
}

const UNIQUE_VIOLATION = '23505';

/**
 * Shape of the error object returned by PostgREST
 */
interface PostgrestLikeError {
  code?: string;
  message: string;
  details?: string | null;
}

/**
 * Convert a PostgREST error into a store error
 */
export function toStoreError(
  operation: string,
  error: PostgrestLikeError
): DuplicateKeyError | StoreError {
  if (error.code === UNIQUE_VIOLATION) {
    return new DuplicateKeyError(
      `${operation}: ${error.message}`,
      error.details ?? undefined
    );
  }
  return new StoreError(`${operation}: ${error.message}`, error.code);
}
