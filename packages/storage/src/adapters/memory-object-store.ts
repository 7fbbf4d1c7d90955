import { createHash, createHmac, timingSafeEqual } from "node:crypto"
import { Readable } from "node:stream"
import {
  BucketError,
  BucketMissingError,
  BucketNotEmptyError,
  ObjectNotFoundError,
} from "../errors"
import {
  allowsAnonymous,
  bucketArn,
  objectArn,
  parsePolicy,
  type PolicyDocument,
} from "../core/policy/bucket-policy"
import { encodeKey } from "../core/path/object-name"
import type { Clock } from "../ports/clock"
import type { ObjectStoreClient } from "../ports/object-store-client"
import type {
  BucketInfo,
  BucketName,
  ObjectKey,
  ObjectMetadataMap,
  ObjectRef,
  StorageData,
  StoredObject,
  StoredObjectMetadata,
} from "../ports/storage-object"
import type {
  ListOptions,
  PresignOptions,
  PutOptions,
  ResponseHeaderOverrides,
} from "../ports/storage-options"
import type { ListResult } from "../ports/storage-result"
import type { Seconds } from "../ports/time"

const DEFAULT_EXPIRES_IN: Seconds = 900

interface StoredEntry {
  data: Buffer
  contentType?: string
  metadata: ObjectMetadataMap
  lastModified: Date
}

interface MemoryBucket {
  createdAt: Date
  objects: Map<ObjectKey, StoredEntry>
  policy?: { raw: string; document: PolicyDocument }
}

/** Query parameters of a presigned GET that carry response header overrides. */
const responseHeaderParams: ReadonlyArray<readonly [keyof ResponseHeaderOverrides, string]> = [
  ["contentType", "response-content-type"],
  ["contentDisposition", "response-content-disposition"],
  ["cacheControl", "response-cache-control"],
  ["contentLanguage", "response-content-language"],
  ["contentEncoding", "response-content-encoding"],
]

export interface MemoryObjectStoreDeps {
  clock: Clock
}

export interface MemoryObjectStoreOptions {
  /** Origin presigned URLs point at. Default: http://localhost:9000 */
  endpoint?: string
  /** Key presigned URLs are signed with. */
  signingSecret?: string
}

/**
 * In-process S3 stand-in. Buckets must be created before use, bucket
 * policies are evaluated for anonymous access, and presigned URLs carry an
 * HMAC over host, path and query that {@link verifyPresignedUrl} checks.
 */
export class MemoryObjectStore implements ObjectStoreClient {
  private readonly buckets = new Map<BucketName, MemoryBucket>()
  private readonly endpoint: URL
  private readonly signingSecret: string

  constructor(
    private readonly deps: MemoryObjectStoreDeps,
    options: MemoryObjectStoreOptions = {},
  ) {
    this.endpoint = new URL(options.endpoint ?? "http://localhost:9000")
    this.signingSecret = options.signingSecret ?? "memory-signing-secret"
  }

  async bucketExists(bucket: BucketName): Promise<boolean> {
    return this.buckets.has(bucket)
  }

  async createBucket(bucket: BucketName): Promise<void> {
    if (this.buckets.has(bucket)) {
      throw new BucketError(`The bucket ${bucket} already exists`, bucket)
    }

    this.buckets.set(bucket, { createdAt: this.deps.clock.now(), objects: new Map() })
  }

  async removeBucket(bucket: BucketName): Promise<void> {
    const entry = this.requireBucket(bucket)
    if (entry.objects.size > 0) throw new BucketNotEmptyError(bucket)

    this.buckets.delete(bucket)
  }

  async listBuckets(): Promise<BucketInfo[]> {
    return Array.from(this.buckets.entries())
      .map(([name, entry]) => ({ name, createdAt: entry.createdAt }))
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
  }

  async getBucketPolicy(bucket: BucketName): Promise<string | null> {
    return this.requireBucket(bucket).policy?.raw ?? null
  }

  async setBucketPolicy(bucket: BucketName, policy: string): Promise<void> {
    const entry = this.requireBucket(bucket)
    entry.policy = { raw: policy, document: parsePolicy(policy) }
  }

  async deleteBucketPolicy(bucket: BucketName): Promise<void> {
    delete this.requireBucket(bucket).policy
  }

  async putObject(ref: ObjectRef, data: StorageData, options?: PutOptions): Promise<void> {
    const entry = this.requireBucket(ref.bucket)
    const buffer = await this.toBuffer(data)

    entry.objects.set(ref.key, {
      data: buffer,
      lastModified: this.deps.clock.now(),
      metadata: { ...options?.metadata },
      ...(options?.contentType && { contentType: options.contentType }),
    })
  }

  async getObject(ref: ObjectRef): Promise<StoredObject | null> {
    const stored = this.requireBucket(ref.bucket).objects.get(ref.key)
    if (!stored) return null

    return {
      ...this.toObjectMetadata(ref.key, stored),
      body: Readable.from([Buffer.from(stored.data)]),
    }
  }

  async statObject(ref: ObjectRef): Promise<StoredObjectMetadata | null> {
    const stored = this.requireBucket(ref.bucket).objects.get(ref.key)
    if (!stored) return null

    return this.toObjectMetadata(ref.key, stored)
  }

  async removeObject(ref: ObjectRef): Promise<void> {
    this.requireBucket(ref.bucket).objects.delete(ref.key)
  }

  async copyObject(src: ObjectRef, dst: ObjectRef): Promise<void> {
    const stored = this.requireBucket(src.bucket).objects.get(src.key)
    if (!stored) throw new ObjectNotFoundError(src.bucket, src.key)

    this.requireBucket(dst.bucket).objects.set(dst.key, {
      data: Buffer.from(stored.data),
      lastModified: this.deps.clock.now(),
      metadata: { ...stored.metadata },
      ...(stored.contentType && { contentType: stored.contentType }),
    })
  }

  async listObjects(bucket: BucketName, options?: ListOptions): Promise<ListResult> {
    const objects = this.requireBucket(bucket).objects
    const prefix = options?.prefix ?? ""
    const delimiter = options?.delimiter
    const maxKeys = options?.maxKeys ?? 1000

    const keys = Array.from(objects.keys())
      .filter((key) => key.startsWith(prefix) && (!options?.cursor || key > options.cursor))
      .sort()

    const result: ListResult = { objects: [], prefixes: [] }
    let lastKey: string | undefined

    for (const key of keys) {
      const commonPrefix = delimiter ? this.extractCommonPrefix(key, prefix, delimiter) : null

      // Keys under one common prefix are contiguous; only a new entry counts.
      if (!(commonPrefix && result.prefixes.at(-1) === commonPrefix)) {
        if (result.objects.length + result.prefixes.length >= maxKeys) {
          if (lastKey !== undefined) result.cursor = lastKey
          break
        }

        const stored = objects.get(key)
        if (commonPrefix) result.prefixes.push(commonPrefix)
        else if (stored) result.objects.push(this.toObjectMetadata(key, stored, false))
      }

      lastKey = key
    }

    return result
  }

  async presignGetObject(ref: ObjectRef, options?: PresignOptions): Promise<URL> {
    this.requireBucket(ref.bucket)

    const origin = options?.signingEndpoint?.origin ?? this.endpoint.origin
    const url = new URL(`/${ref.bucket}/${encodeKey(ref.key)}`, origin)

    for (const [field, param] of responseHeaderParams) {
      const value = options?.responseHeaders?.[field]
      if (value !== undefined) url.searchParams.set(param, value)
    }

    url.searchParams.set("X-Amz-Date", String(this.deps.clock.nowMs()))
    url.searchParams.set(
      "X-Amz-Expires",
      String(options?.expiresInSeconds ?? DEFAULT_EXPIRES_IN),
    )
    url.searchParams.set("X-Amz-Signature", this.sign(url))

    return url
  }

  /**
   * `true` when `url` was issued by this store, has not been altered (host
   * included) and has not expired.
   */
  verifyPresignedUrl(url: URL): boolean {
    const signature = url.searchParams.get("X-Amz-Signature")
    const issuedAt = Number(url.searchParams.get("X-Amz-Date"))
    const expiresIn = Number(url.searchParams.get("X-Amz-Expires"))
    if (!signature || !Number.isFinite(issuedAt) || !Number.isFinite(expiresIn)) {
      return false
    }

    const expected = Buffer.from(this.sign(url), "hex")
    const actual = Buffer.from(signature, "hex")
    if (expected.length !== actual.length || !timingSafeEqual(expected, actual)) {
      return false
    }

    return this.deps.clock.nowMs() <= issuedAt + expiresIn * 1000
  }

  /**
   * Evaluates the bucket policy for an unauthenticated request. Object
   * actions ("s3:GetObject") need a key; bucket actions do not.
   */
  isAnonymousActionAllowed(bucket: BucketName, action: string, key?: ObjectKey): boolean {
    const policy = this.requireBucket(bucket).policy
    if (!policy) return false

    const resource = key === undefined ? bucketArn(bucket) : objectArn(bucket, key)
    return allowsAnonymous(policy.document, action, resource)
  }

  private sign(url: URL): string {
    const params = Array.from(url.searchParams.entries())
      .filter(([name]) => name !== "X-Amz-Signature")
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([name, value]) => `${encodeURIComponent(name)}=${encodeURIComponent(value)}`)
      .join("&")

    return createHmac("sha256", this.signingSecret)
      .update(["GET", url.host, url.pathname, params].join("\n"))
      .digest("hex")
  }

  private requireBucket(bucket: BucketName): MemoryBucket {
    const entry = this.buckets.get(bucket)
    if (!entry) throw new BucketMissingError(bucket)

    return entry
  }

  private toObjectMetadata(
    key: ObjectKey,
    stored: StoredEntry,
    withMetadata = true,
  ): StoredObjectMetadata {
    return {
      key,
      sizeInBytes: stored.data.length,
      lastModified: stored.lastModified,
      etag: this.computeEtag(stored.data),
      ...(stored.contentType && { contentType: stored.contentType }),
      ...(withMetadata && { metadata: { ...stored.metadata } }),
    }
  }

  private extractCommonPrefix(key: string, prefix: string, delimiter: string): string | null {
    const relativePath = key.slice(prefix.length)
    const delimiterIndex = relativePath.indexOf(delimiter)

    if (delimiterIndex < 0) return null

    return prefix + relativePath.slice(0, delimiterIndex + delimiter.length)
  }

  private async toBuffer(data: StorageData): Promise<Buffer> {
    if (typeof data === "string") return Buffer.from(data, "utf8")
    if (data instanceof Uint8Array) return Buffer.from(data)

    const chunks: Buffer[] = []
    for await (const chunk of data) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk))
    }

    return Buffer.concat(chunks)
  }

  private computeEtag(data: Buffer): string {
    return `"${createHash("md5").update(data).digest("hex")}"`
  }
}
