import { TransportError } from "./errors"
import { type ErrorContext, StorageError } from "./storage-error"

export function isStorageError(err: unknown): err is StorageError {
  return err instanceof StorageError
}

/**
 * Storage errors pass through; anything else thrown by a store client is
 * wrapped in a {@link TransportError} carrying the original as `cause`.
 */
export function toStorageError(
  err: unknown,
  message: string,
  context: ErrorContext = {},
): StorageError {
  if (err instanceof StorageError) return err

  return new TransportError(message, { context, cause: err })
}

/** Name of a thrown value, for matching SDK exceptions. */
export function errorName(err: unknown): string | undefined {
  return err instanceof Error ? err.name : undefined
}
