import type {
  BucketInfo,
  BucketName,
  ObjectRef,
  StorageData,
  StoredObject,
  StoredObjectMetadata,
} from "./storage-object"
import type { ListOptions, PresignOptions, PutOptions } from "./storage-options"
import type { ListResult } from "./storage-result"

/**
 * Thin client over an S3-compatible object store.
 *
 * Adapters translate "no such bucket" into `BucketMissingError`, a missing
 * copy source into `ObjectNotFoundError`, and let other failures through.
 */
export interface ObjectStoreClient {
  bucketExists(bucket: BucketName): Promise<boolean>

  createBucket(bucket: BucketName): Promise<void>

  /** Fails with `BucketNotEmptyError` when objects remain. */
  removeBucket(bucket: BucketName): Promise<void>

  listBuckets(): Promise<BucketInfo[]>

  /** Policy JSON, or null when the bucket has none. */
  getBucketPolicy(bucket: BucketName): Promise<string | null>

  setBucketPolicy(bucket: BucketName, policy: string): Promise<void>

  deleteBucketPolicy(bucket: BucketName): Promise<void>

  /** Upload an object. Overwrites if it exists. */
  putObject(ref: ObjectRef, data: StorageData, options?: PutOptions): Promise<void>

  /** Returns null if not found. */
  getObject(ref: ObjectRef): Promise<StoredObject | null>

  /**
   * Metadata without body. Returns null if not found. A missing bucket still
   * fails with `BucketMissingError`, at the cost of an extra bucket check
   * when the object is absent.
   */
  statObject(ref: ObjectRef): Promise<StoredObjectMetadata | null>

  /** No-op if the object is missing. */
  removeObject(ref: ObjectRef): Promise<void>

  /** Server-side copy, keeping content type and metadata. */
  copyObject(src: ObjectRef, dst: ObjectRef): Promise<void>

  /** One page of a listing. Use cursor for the next one. */
  listObjects(bucket: BucketName, options?: ListOptions): Promise<ListResult>

  /** Time-limited GET URL. Never checks that the object exists. */
  presignGetObject(ref: ObjectRef, options?: PresignOptions): Promise<URL>
}
