export { S3Client } from "@aws-sdk/client-s3"
export {
  type CreateMemoryObjectStoreOptions,
  type CreateS3ObjectStoreOptions,
  createMemoryObjectStore,
  createS3ObjectStore,
  type S3ConnectionSettings,
} from "./adapters/create"
export { FakeClock } from "./adapters/fake-clock"
export {
  MemoryObjectStore,
  type MemoryObjectStoreDeps,
  type MemoryObjectStoreOptions,
} from "./adapters/memory-object-store"
export { S3ObjectStore, type S3ObjectStoreDeps } from "./adapters/s3-object-store"
export { SystemClock } from "./adapters/system-clock"
export {
  createStorages,
  type StorageServiceDeps,
  type StorageServices,
} from "./composition/create-storages"
export { loadSettings, type LoadSettingsOptions } from "./config/load-settings"
export {
  type LoadedStorageSettings,
  type LoadStorageSettingsOptions,
  type LoggingSettings,
  loadStorageSettings,
  type StorageSettings,
  toStorageSettings,
} from "./config/load-storage-settings"
export { LoadedSettings, type SettingsTrace } from "./config/loaded-settings"
export type { SettingsSource } from "./config/settings-source"
export { DotenvSource, type DotenvSourceOptions } from "./config/sources/dotenv-source"
export { EnvSource, type EnvSourceOptions } from "./config/sources/env-source"
export { ObjectSource } from "./config/sources/object-source"
export { type StorageEnv, storageEnvSchema } from "./config/storage-env-schema"
export {
  BucketAdmin,
  type BucketAdminDeps,
  type ListObjectsOptions,
  type ObjectListing,
} from "./core/admin/bucket-admin"
export { BackupOnDelete } from "./core/backup/backup-on-delete"
export { renderTimeTemplate } from "./core/backup/time-template"
export { resolveStorageConfig } from "./core/config/resolve-storage-config"
export { DEFAULT_CONTENT_TYPE, guessContentType } from "./core/path/content-type"
export {
  encodeKey,
  joinUrl,
  normalizeName,
  toListingPrefix,
  withNameSuffix,
} from "./core/path/object-name"
export {
  type PolicyDocument,
  type PolicyStatement,
  parsePolicy,
  parsePolicyKind,
  policyKindFromSetting,
  serializePolicy,
  toNativePolicy,
} from "./core/policy/bucket-policy"
export { BucketProvisioner, type ProvisionState } from "./core/provisioning/bucket-provisioner"
export { BucketStorage, type BucketStorageDeps } from "./core/storage/bucket-storage"
export { UrlBuilder } from "./core/url/url-builder"
export * from "./errors"
export type { Clock } from "./ports/clock"
export type { FileStorage } from "./ports/file-storage"
export type { ObjectStoreClient } from "./ports/object-store-client"
export { isPolicyKind, type PolicyKind, policyKinds } from "./ports/policy-kind"
export type { StorageConfig, StorageConfigInput } from "./ports/storage-config"
export type {
  BucketInfo,
  BucketName,
  Bytes,
  ObjectKey,
  ObjectMetadataMap,
  ObjectRef,
  StorageData,
  StoredObject,
  StoredObjectMetadata,
} from "./ports/storage-object"
export type {
  ListOptions,
  PresignOptions,
  PutOptions,
  ResponseHeaderOverrides,
  SaveOptions,
  UrlOptions,
} from "./ports/storage-options"
export type { DirectoryListing, ListResult } from "./ports/storage-result"
export type { Milliseconds, Seconds } from "./ports/time"
