/**
 * Error kinds raised by the offline layer.
 */

/**
 * The local queue could not read or write (store unavailable, quota exceeded,
 * aborted transaction). An operation that failed with this error is not queued.
 */
export class QueueStorageError extends Error {
  readonly storageErrorName: string | null;

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "QueueStorageError";
    this.storageErrorName = errorName(cause);
  }
}

/**
 * An operation with the same idempotency token is already in the queue.
 */
export class DuplicateOperationError extends QueueStorageError {
  readonly localId: string;

  constructor(localId: string, cause?: unknown) {
    super(`Operation ${localId} is already queued`, cause);
    this.name = "DuplicateOperationError";
    this.localId = localId;
  }
}

/**
 * Form input rejected before it could be queued.
 */
export class FormValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FormValidationError";
  }
}

function errorName(cause: unknown): string | null {
  if (typeof cause === "object" && cause !== null && "name" in cause) {
    return typeof cause.name === "string" ? cause.name : null;
  }
  return null;
}

export function describeError(error: unknown, fallback: string): string {
  return error instanceof Error ? error.message : fallback;
}
