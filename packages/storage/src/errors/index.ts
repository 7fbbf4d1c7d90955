export {
  BackupBucketMissingError,
  BucketError,
  BucketMissingError,
  BucketNotEmptyError,
  InvalidObjectNameError,
  ObjectNotFoundError,
  StorageConfigError,
  TransportError,
} from "./errors"
export {
  type ErrorCode,
  type ErrorContext,
  type SerializedError,
  type SerializeOptions,
  serializeError,
  StorageError,
  type StorageErrorOptions,
} from "./storage-error"
export { errorName, isStorageError, toStorageError } from "./utils"
