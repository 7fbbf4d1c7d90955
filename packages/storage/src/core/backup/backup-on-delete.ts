import type { Logger } from "@stowage/logger"
import { BackupBucketMissingError } from "../../errors"
import type { Clock } from "../../ports/clock"
import type { ObjectStoreClient } from "../../ports/object-store-client"
import type { StorageConfig } from "../../ports/storage-config"
import type { ObjectKey, ObjectRef } from "../../ports/storage-object"
import { renderTimeTemplate } from "./time-template"

export interface BackupOnDeleteDeps {
  store: ObjectStoreClient
  clock: Clock
  logger: Logger
}

export type BackupOnDeleteOptions = Pick<
  StorageConfig,
  "bucketName" | "backupBucketName" | "backupFormat"
>

/**
 * Deletes objects, archiving them first when a backup bucket is configured.
 * The source is removed only after the copy succeeded.
 */
export class BackupOnDelete {
  constructor(
    private readonly deps: BackupOnDeleteDeps,
    private readonly options: BackupOnDeleteOptions,
  ) {}

  get enabled(): boolean {
    return this.options.backupBucketName !== undefined && this.options.backupFormat !== undefined
  }

  /** Key the object is archived under if deleted now. */
  destinationKey(key: ObjectKey): ObjectKey {
    return `${renderTimeTemplate(this.options.backupFormat ?? "", this.deps.clock.now())}${key}`
  }

  async delete(key: ObjectKey): Promise<void> {
    const source: ObjectRef = { bucket: this.options.bucketName, key }
    const backupBucket = this.options.backupBucketName

    if (backupBucket === undefined || !this.enabled) {
      await this.deps.store.removeObject(source)
      return
    }

    if (!(await this.deps.store.bucketExists(backupBucket))) {
      throw new BackupBucketMissingError(backupBucket, { context: { key } })
    }

    const destination: ObjectRef = { bucket: backupBucket, key: this.destinationKey(key) }

    // Fails with ObjectNotFoundError for a missing source.
    await this.deps.store.copyObject(source, destination)

    this.deps.logger.warn("object archived before delete", {
      operation: "delete",
      key,
      backupBucket,
      backupKey: destination.key,
    })

    await this.deps.store.removeObject(source)
  }
}
