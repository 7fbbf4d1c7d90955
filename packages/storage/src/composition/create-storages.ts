import { createPinoLogger, type Logger } from "@stowage/logger"
import { createS3ObjectStore } from "../adapters/create"
import { SystemClock } from "../adapters/system-clock"
import type { StorageSettings } from "../config/load-storage-settings"
import { BucketAdmin } from "../core/admin/bucket-admin"
import { BucketStorage } from "../core/storage/bucket-storage"
import type { Clock } from "../ports/clock"
import type { ObjectStoreClient } from "../ports/object-store-client"

export type StorageServices = {
  logger: Logger
  store: ObjectStoreClient
  media: BucketStorage
  static?: BucketStorage
  admin: BucketAdmin
}

export type StorageServiceDeps = {
  logger?: Logger
  clock?: Clock
  /** Replaces the S3 store built from `settings.connection`. */
  store?: ObjectStoreClient
}

/**
 * Wires one logger and one store client into the media and static
 * storages and the bucket admin. Throws `StorageConfigError` for invalid
 * storage settings.
 */
export function createStorages(
  settings: StorageSettings,
  deps: StorageServiceDeps = {},
): StorageServices {
  const clock = deps.clock ?? new SystemClock()
  const logger =
    deps.logger ??
    createPinoLogger(
      {},
      { level: settings.logging.level, prettify: settings.logging.prettify },
      { service: settings.logging.serviceName },
    )
  const store = deps.store ?? createS3ObjectStore({ connection: settings.connection, clock })

  const media = new BucketStorage({ store, logger, clock }, settings.media)
  const staticStorage = settings.static
    ? new BucketStorage({ store, logger, clock }, settings.static)
    : undefined

  const admin = new BucketAdmin({
    store,
    logger,
    storageFor: (bucket) =>
      [media, staticStorage].find((storage) => storage?.bucketName === bucket),
  })

  return {
    logger,
    store,
    media,
    admin,
    ...(staticStorage && { static: staticStorage }),
  }
}
