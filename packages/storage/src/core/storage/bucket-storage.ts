import type { Readable } from "node:stream"
import { createNullLogger, type Logger } from "@stowage/logger"
import { customAlphabet } from "nanoid"
import { SystemClock } from "../../adapters/system-clock"
import {
  InvalidObjectNameError,
  ObjectNotFoundError,
  toStorageError,
} from "../../errors"
import type { Clock } from "../../ports/clock"
import type { FileStorage } from "../../ports/file-storage"
import type { ObjectStoreClient } from "../../ports/object-store-client"
import type { StorageConfig, StorageConfigInput } from "../../ports/storage-config"
import type {
  Bytes,
  ObjectKey,
  ObjectRef,
  StorageData,
  StoredObjectMetadata,
} from "../../ports/storage-object"
import type { SaveOptions, UrlOptions } from "../../ports/storage-options"
import type { DirectoryListing } from "../../ports/storage-result"
import { BackupOnDelete } from "../backup/backup-on-delete"
import { resolveStorageConfig } from "../config/resolve-storage-config"
import { DEFAULT_CONTENT_TYPE, guessContentType } from "../path/content-type"
import { normalizeName, toListingPrefix, withNameSuffix } from "../path/object-name"
import { BucketProvisioner } from "../provisioning/bucket-provisioner"
import { UrlBuilder } from "../url/url-builder"

const MAX_NAME_ATTEMPTS = 100

const randomSuffix = customAlphabet(
  "abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789",
  7,
)

export interface BucketStorageDeps {
  store: ObjectStoreClient
  logger?: Logger
  clock?: Clock
  /** Suffix source for renamed saves when overwriting is off. */
  generateSuffix?: () => string
}

/**
 * {@link FileStorage} over one bucket. Media and static files are two
 * instances with different configs.
 */
export class BucketStorage implements FileStorage {
  readonly config: StorageConfig

  private readonly logger: Logger
  private readonly clock: Clock
  private readonly provisioner: BucketProvisioner
  private readonly urlBuilder: UrlBuilder
  private readonly backup: BackupOnDelete

  constructor(
    private readonly deps: BucketStorageDeps,
    config: StorageConfigInput,
  ) {
    this.config = resolveStorageConfig(config)
    this.clock = deps.clock ?? new SystemClock()
    this.logger = (deps.logger ?? createNullLogger()).child({
      module: "storage",
      bucket: this.config.bucketName,
    })

    this.provisioner = new BucketProvisioner(
      { store: deps.store, logger: this.logger },
      this.config,
    )
    this.urlBuilder = new UrlBuilder({ store: deps.store }, this.config)
    this.backup = new BackupOnDelete(
      { store: deps.store, clock: this.clock, logger: this.logger },
      this.config,
    )
  }

  get bucketName(): string {
    return this.config.bucketName
  }

  ready(): Promise<void> {
    return this.provisioner.ensure()
  }

  async save(name: string, content: StorageData, options?: SaveOptions): Promise<ObjectKey> {
    const key = this.requireKey(name)

    return this.run("save", key, async () => {
      const finalKey = this.config.fileOverwrite ? key : await this.availableKey(key)
      const contentType =
        options?.contentType ?? guessContentType(finalKey) ?? DEFAULT_CONTENT_TYPE

      await this.deps.store.putObject(this.ref(finalKey), content, {
        contentType,
        metadata: { ...this.config.objectMetadata, ...options?.metadata },
      })

      return finalKey
    })
  }

  async open(name: string): Promise<Readable> {
    const key = this.requireKey(name)

    return this.run("open", key, async () => {
      const object = await this.deps.store.getObject(this.ref(key))
      if (!object) throw new ObjectNotFoundError(this.bucketName, key)

      return object.body
    })
  }

  async exists(name: string): Promise<boolean> {
    const key = normalizeName(name)

    return this.run("exists", key, async () => {
      if (!key) return false

      return (await this.deps.store.statObject(this.ref(key))) !== null
    })
  }

  async delete(name: string): Promise<void> {
    const key = this.requireKey(name)

    await this.run("delete", key, () => this.backup.delete(key))
  }

  async listdir(path = ""): Promise<DirectoryListing> {
    const prefix = toListingPrefix(path)

    return this.run("listdir", prefix, async () => {
      const listing: DirectoryListing = { directories: [], files: [] }
      let cursor: string | undefined

      do {
        const page = await this.deps.store.listObjects(this.bucketName, {
          prefix,
          delimiter: "/",
          ...(cursor !== undefined && { cursor }),
        })

        for (const dir of page.prefixes) {
          const relative = dir.slice(prefix.length).replace(/\/+$/, "")
          if (relative) listing.directories.push(relative)
        }
        for (const object of page.objects) {
          const relative = object.key.slice(prefix.length)
          if (relative) listing.files.push(relative)
        }

        cursor = page.cursor
      } while (cursor !== undefined)

      return listing
    })
  }

  async url(name: string, options?: UrlOptions): Promise<URL> {
    const key = normalizeName(name)

    return this.run("url", key, () => this.urlBuilder.buildUrl(key, options))
  }

  async size(name: string): Promise<Bytes> {
    return (await this.stat(name)).sizeInBytes
  }

  async lastModified(name: string): Promise<Date> {
    return (await this.stat(name)).lastModified
  }

  async stat(name: string): Promise<StoredObjectMetadata> {
    const key = this.requireKey(name)

    return this.run("stat", key, async () => {
      const metadata = await this.deps.store.statObject(this.ref(key))
      if (!metadata) throw new ObjectNotFoundError(this.bucketName, key)

      return metadata
    })
  }

  private ref(key: ObjectKey): ObjectRef {
    return { bucket: this.bucketName, key }
  }

  private requireKey(name: string): ObjectKey {
    const key = normalizeName(name)
    if (!key || key.endsWith("/")) {
      throw new InvalidObjectNameError(name, { context: { bucket: this.bucketName } })
    }

    return key
  }

  /** `key`, or the first free `stem_<suffix>.ext` variant of it. */
  private async availableKey(key: ObjectKey): Promise<ObjectKey> {
    const generate = this.deps.generateSuffix ?? randomSuffix
    let candidate = key

    for (let attempt = 0; attempt < MAX_NAME_ATTEMPTS; attempt++) {
      if ((await this.deps.store.statObject(this.ref(candidate))) === null) return candidate
      candidate = withNameSuffix(key, generate())
    }

    throw new InvalidObjectNameError(key, {
      context: { bucket: this.bucketName, reason: "no free name found" },
    })
  }

  /**
   * Waits for provisioning, then runs `fn`. Store failures that are not
   * storage errors come out as `TransportError`.
   */
  private async run<T>(operation: string, key: string, fn: () => Promise<T>): Promise<T> {
    await this.provisioner.ensure()

    const startedAt = this.clock.nowMs()
    try {
      const result = await fn()
      this.logger.debug(`${operation} completed`, {
        operation,
        key,
        durationMs: this.clock.nowMs() - startedAt,
      })

      return result
    } catch (err) {
      const error = toStorageError(err, `${operation} failed for ${key}`, {
        bucket: this.bucketName,
        key,
        operation,
      })

      if (!(error instanceof ObjectNotFoundError)) {
        this.logger.error(`${operation} failed`, { operation, key, err: error })
      }

      throw error
    }
  }
}
