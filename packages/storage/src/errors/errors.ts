import type { ErrorContext } from "./storage-error"
import { StorageError } from "./storage-error"

type DetailOptions = Readonly<{
  context?: ErrorContext
  cause?: unknown
}>

/** Invalid, missing or contradictory settings. Raised at construction. */
export class StorageConfigError extends StorageError<"config_error"> {
  constructor(message: string, options: DetailOptions = {}) {
    super(message, { ...options, code: "config_error", isOperational: false })
  }
}

export class BucketMissingError extends StorageError<"bucket_missing"> {
  constructor(bucket: string, options: DetailOptions = {}) {
    super(`The bucket ${bucket} does not exist`, {
      ...options,
      code: "bucket_missing",
      context: { ...options.context, bucket },
    })
  }
}

/** A bucket check, create or policy call failed. */
export class BucketError extends StorageError<"bucket_error"> {
  constructor(message: string, bucket: string, options: DetailOptions = {}) {
    super(message, {
      ...options,
      code: "bucket_error",
      context: { ...options.context, bucket },
    })
  }
}

export class BucketNotEmptyError extends StorageError<"bucket_not_empty"> {
  constructor(bucket: string, options: DetailOptions = {}) {
    super(`The bucket ${bucket} is not empty`, {
      ...options,
      code: "bucket_not_empty",
      context: { ...options.context, bucket },
    })
  }
}

/** Backup-on-delete is configured but the backup bucket is absent. */
export class BackupBucketMissingError extends StorageError<"backup_bucket_missing"> {
  constructor(bucket: string, options: DetailOptions = {}) {
    super(`The backup bucket ${bucket} does not exist`, {
      ...options,
      code: "backup_bucket_missing",
      context: { ...options.context, bucket },
    })
  }
}

export class ObjectNotFoundError extends StorageError<"object_not_found"> {
  constructor(bucket: string, key: string, options: DetailOptions = {}) {
    super(`No object ${key} in bucket ${bucket}`, {
      ...options,
      code: "object_not_found",
      context: { ...options.context, bucket, key },
    })
  }
}

export class InvalidObjectNameError extends StorageError<"invalid_object_name"> {
  constructor(name: string, options: DetailOptions = {}) {
    super(`"${name}" does not name an object`, {
      ...options,
      code: "invalid_object_name",
      context: { ...options.context, name },
    })
  }
}

/** The store client failed for network, auth or protocol reasons. */
export class TransportError extends StorageError<"transport_error"> {
  constructor(message: string, options: DetailOptions = {}) {
    super(message, { ...options, code: "transport_error", isRetryable: true })
  }
}
