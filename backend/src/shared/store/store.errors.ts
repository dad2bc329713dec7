/**
 * backend/src/shared/store/store.errors.ts
 *
 * WHY:
 * - Driver failures (connection refused, timeouts, bad SQL) must not leak driver
 *   details. Store implementations wrap them here; the HTTP error handler maps
 *   StoreUnavailableError to a generic 500 DATABASE_ERROR.
 */

export type StoreOperation =
  | 'findOne'
  | 'findMany'
  | 'count'
  | 'insertOne'
  | 'updateOne'
  | 'deleteOne'
  | 'addToSet'
  | 'pull';

export class StoreUnavailableError extends Error {
  constructor(
    readonly operation: StoreOperation,
    readonly collection: string,
    options?: { cause?: unknown },
  ) {
    super(`Document store ${operation} on "${collection}" failed`, options);
    this.name = 'StoreUnavailableError';
  }
}

/** Raised when insertOne hits an id that already exists in the collection. */
export class DuplicateDocumentError extends Error {
  constructor(
    readonly collection: string,
    readonly id: string,
  ) {
    super(`Document "${id}" already exists in "${collection}"`);
    this.name = 'DuplicateDocumentError';
  }
}
