import type { Readable } from "node:stream"
import type { Bytes, ObjectKey, StorageData, StoredObjectMetadata } from "./storage-object"
import type { SaveOptions, UrlOptions } from "./storage-options"
import type { DirectoryListing } from "./storage-result"

/**
 * Named-file view of a single bucket. Names are normalized before use;
 * every call waits for the bucket to be provisioned first.
 */
export interface FileStorage {
  /** Resolves once the bucket is provisioned; rejects with the cached failure. */
  ready(): Promise<void>

  /** Store content and return the key it landed under. */
  save(name: string, content: StorageData, options?: SaveOptions): Promise<ObjectKey>

  /** Fails with `ObjectNotFoundError` if missing. */
  open(name: string): Promise<Readable>

  exists(name: string): Promise<boolean>

  /** Removes the object, archiving it first when backup is configured. */
  delete(name: string): Promise<void>

  /** Immediate children of `path` ("" is the bucket root). */
  listdir(path?: string): Promise<DirectoryListing>

  url(name: string, options?: UrlOptions): Promise<URL>

  size(name: string): Promise<Bytes>

  lastModified(name: string): Promise<Date>

  stat(name: string): Promise<StoredObjectMetadata>
}
