import type { Readable } from "node:stream"

export type StorageData = Readable | Buffer | Uint8Array | string

export type Bytes = number

/**
 * Key of an object within a bucket, e.g. "photos/2024/cat.jpg".
 * Keys handed to a store client are already normalized.
 */
export type ObjectKey = string

export type BucketName = string

export interface ObjectRef {
  bucket: BucketName
  key: ObjectKey
}

/** User metadata stored alongside an object (x-amz-meta-* on the wire). */
export type ObjectMetadataMap = Record<string, string>

export type StoredObjectMetadata = {
  key: ObjectKey
  sizeInBytes: Bytes
  lastModified: Date
  contentType?: string
  etag?: string
  /** May be absent from listings. */
  metadata?: ObjectMetadataMap
}

export interface StoredObject extends StoredObjectMetadata {
  body: Readable
}

export interface BucketInfo {
  name: BucketName
  createdAt?: Date
}
