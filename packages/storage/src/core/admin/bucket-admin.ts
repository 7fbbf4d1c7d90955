import { createNullLogger, type Logger } from "@stowage/logger"
import {
  BucketError,
  BucketMissingError,
  BucketNotEmptyError,
  StorageConfigError,
  toStorageError,
} from "../../errors"
import type { FileStorage } from "../../ports/file-storage"
import type { ObjectStoreClient } from "../../ports/object-store-client"
import type { PolicyKind } from "../../ports/policy-kind"
import type { BucketName, StoredObjectMetadata } from "../../ports/storage-object"
import { serializePolicy, toNativePolicy } from "../policy/bucket-policy"

export interface BucketAdminDeps {
  store: ObjectStoreClient
  logger?: Logger
  /** Storage serving `bucket`, used to render `$url` in listings. */
  storageFor?: (bucket: BucketName) => FileStorage | undefined
}

export interface ListObjectsOptions {
  prefix?: string
  /** Walk the whole tree instead of one level. */
  recursive?: boolean
  /** Include directories. Default: true */
  dirs?: boolean
  /** Include files. Default: true */
  files?: boolean
  /** Template over $name $size $modified $url $etag. Default: "$name" */
  format?: string
}

export interface ObjectListing {
  lines: string[]
  fileCount: number
  dirCount: number
}

const placeholders = ["name", "size", "modified", "url", "etag"] as const
type Placeholder = (typeof placeholders)[number]

function isPlaceholder(value: string): value is Placeholder {
  return placeholders.some((placeholder) => placeholder === value)
}

const placeholderPattern = /\$(?:\{(\w+)\}|(\w+))/g

/** Operator tooling over buckets: checks, creation, listings and policies. */
export class BucketAdmin {
  private readonly logger: Logger

  constructor(private readonly deps: BucketAdminDeps) {
    this.logger = (deps.logger ?? createNullLogger()).child({ module: "bucket-admin" })
  }

  async checkBucket(bucket: BucketName): Promise<void> {
    const exists = await this.call("checkBucket", bucket, () =>
      this.deps.store.bucketExists(bucket),
    )
    if (!exists) throw new BucketMissingError(bucket)
  }

  async createBucket(bucket: BucketName): Promise<void> {
    await this.call("createBucket", bucket, async () => {
      if (await this.deps.store.bucketExists(bucket)) {
        throw new BucketError(`The bucket ${bucket} already exists`, bucket)
      }

      await this.deps.store.createBucket(bucket)
    })

    this.logger.info("bucket created", { operation: "createBucket", bucket })
  }

  /** Removes an empty bucket. */
  async deleteBucket(bucket: BucketName): Promise<void> {
    await this.checkBucket(bucket)

    await this.call("deleteBucket", bucket, async () => {
      const page = await this.deps.store.listObjects(bucket, { maxKeys: 1 })
      if (page.objects.length > 0 || page.prefixes.length > 0) {
        throw new BucketNotEmptyError(bucket)
      }

      await this.deps.store.removeBucket(bucket)
    })

    this.logger.info("bucket deleted", { operation: "deleteBucket", bucket })
  }

  async listBuckets(): Promise<BucketName[]> {
    const buckets = await this.call("listBuckets", "*", () => this.deps.store.listBuckets())

    return buckets.map((bucket) => bucket.name)
  }

  async listObjects(bucket: BucketName, options: ListObjectsOptions = {}): Promise<ObjectListing> {
    const format = options.format ?? "$name"
    const used = this.checkFormat(format)
    const storage = used.has("url") ? this.deps.storageFor?.(bucket) : undefined

    await this.checkBucket(bucket)

    const listing: ObjectListing = { lines: [], fileCount: 0, dirCount: 0 }
    const includeDirs = options.dirs ?? true
    const includeFiles = options.files ?? true
    let cursor: string | undefined

    do {
      const page = await this.call("listObjects", bucket, () =>
        this.deps.store.listObjects(bucket, {
          ...(options.prefix && { prefix: options.prefix }),
          ...(!options.recursive && { delimiter: "/" }),
          ...(cursor !== undefined && { cursor }),
        }),
      )

      if (includeDirs) {
        for (const prefix of page.prefixes) {
          listing.lines.push(await this.render(format, { name: prefix }, storage))
          listing.dirCount++
        }
      }
      if (includeFiles) {
        for (const object of page.objects) {
          listing.lines.push(await this.render(format, { name: object.key, object }, storage))
          listing.fileCount++
        }
      }

      cursor = page.cursor
    } while (cursor !== undefined)

    return listing
  }

  /** The bucket policy as JSON indented by two spaces. */
  async getPolicy(bucket: BucketName): Promise<string> {
    const policy = await this.call("getPolicy", bucket, () =>
      this.deps.store.getBucketPolicy(bucket),
    )
    if (policy === null) {
      throw new BucketError(`The bucket ${bucket} has no policy`, bucket)
    }

    let parsed: unknown
    try {
      parsed = JSON.parse(policy)
    } catch (err) {
      throw new BucketError(`The policy of bucket ${bucket} is not valid JSON`, bucket, {
        cause: err,
      })
    }

    return JSON.stringify(parsed, null, 2)
  }

  /** NONE removes the policy. */
  async setPolicy(bucket: BucketName, kind: PolicyKind): Promise<void> {
    await this.checkBucket(bucket)

    const policy = toNativePolicy(bucket, kind)
    await this.call("setPolicy", bucket, () =>
      policy
        ? this.deps.store.setBucketPolicy(bucket, serializePolicy(policy))
        : this.deps.store.deleteBucketPolicy(bucket),
    )

    this.logger.info("bucket policy set", { operation: "setPolicy", bucket, policy: kind })
  }

  private checkFormat(format: string): Set<Placeholder> {
    const used = new Set<Placeholder>()

    for (const match of format.matchAll(placeholderPattern)) {
      const name = match[1] ?? match[2] ?? ""
      if (!isPlaceholder(name)) {
        throw new StorageConfigError(`Unknown placeholder $${name} in list format`, {
          context: { format },
        })
      }
      used.add(name)
    }

    return used
  }

  private async render(
    format: string,
    entry: { name: string; object?: StoredObjectMetadata },
    storage: FileStorage | undefined,
  ): Promise<string> {
    const values: Record<Placeholder, string> = {
      name: entry.name,
      size: entry.object ? String(entry.object.sizeInBytes) : "",
      modified: entry.object ? entry.object.lastModified.toISOString() : "",
      etag: entry.object?.etag ?? "",
      url: entry.object && storage ? (await storage.url(entry.name)).href : "",
    }

    return format.replace(placeholderPattern, (_match, braced?: string, bare?: string) => {
      const name = braced ?? bare ?? ""
      return isPlaceholder(name) ? values[name] : ""
    })
  }

  private async call<T>(operation: string, bucket: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn()
    } catch (err) {
      throw toStorageError(err, `${operation} failed for bucket ${bucket}`, {
        bucket,
        operation,
      })
    }
  }
}
