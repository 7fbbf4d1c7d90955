import type { StoredObjectMetadata } from "./storage-object"

export interface ListResult {
  objects: StoredObjectMetadata[]

  /** Common prefixes when a delimiter is set, each ending with it */
  prefixes: string[]

  /** Opaque token for the next page. Undefined on the last page. */
  cursor?: string
}

/** One level of a bucket, relative to the listed path. */
export interface DirectoryListing {
  directories: string[]
  files: string[]
}
