import type { PolicyKind } from "./policy-kind"
import type { BucketName, ObjectMetadataMap } from "./storage-object"

/**
 * Settings of one bucket-backed storage, before defaults are applied.
 */
export type StorageConfigInput = {
  bucketName: BucketName
  /** Store host[:port], without scheme */
  endpoint?: string
  useHttps?: boolean
  /** Absolute http(s) URL under which objects are published */
  baseUrl?: string
  usePresignedUrls?: boolean
  autoCreateBucket?: boolean
  assumeBucketExists?: boolean
  autoCreatePolicy?: PolicyKind
  objectMetadata?: ObjectMetadataMap
  backupBucketName?: BucketName
  /** strftime-style template rendered in UTC and prepended to backup keys */
  backupFormat?: string
  /** When false, saving to a taken name picks a fresh one */
  fileOverwrite?: boolean
}

export type StorageConfig = Readonly<{
  bucketName: BucketName
  endpoint?: string
  useHttps: boolean
  /** Without trailing slash */
  baseUrl?: string
  usePresignedUrls: boolean
  autoCreateBucket: boolean
  assumeBucketExists: boolean
  autoCreatePolicy: PolicyKind
  objectMetadata: Readonly<ObjectMetadataMap>
  backupBucketName?: BucketName
  backupFormat?: string
  fileOverwrite: boolean
}>
