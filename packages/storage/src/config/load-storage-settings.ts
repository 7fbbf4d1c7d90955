import type { LogLevelName } from "@stowage/logger"
import type { S3ConnectionSettings } from "../adapters/create"
import type { PolicyKind } from "../ports/policy-kind"
import type { StorageConfigInput } from "../ports/storage-config"
import type { ObjectMetadataMap } from "../ports/storage-object"
import { loadSettings } from "./load-settings"
import type { LoadedSettings } from "./loaded-settings"
import type { SettingsSource } from "./settings-source"
import { DotenvSource } from "./sources/dotenv-source"
import { EnvSource } from "./sources/env-source"
import { ObjectSource } from "./sources/object-source"
import { type StorageEnv, storageEnvSchema } from "./storage-env-schema"

export type LoggingSettings = {
  level: LogLevelName
  prettify: boolean
  serviceName: string
}

export type StorageSettings = {
  connection: S3ConnectionSettings
  logging: LoggingSettings
  media: StorageConfigInput
  /** Present when a static bucket is configured. */
  static?: StorageConfigInput
}

export type LoadStorageSettingsOptions = {
  /** Directory holding `.env.<NODE_ENV>`. Default: process.cwd() */
  cwd?: string
  /** Applied last. */
  overrides?: Record<string, unknown>
}

export type LoadedStorageSettings = {
  settings: StorageSettings
  env: LoadedSettings<StorageEnv>
}

type UseSettings = {
  bucketName: string
  baseUrl: string | undefined
  usePresigned: boolean
  autoCreateBucket: boolean
  assumeBucketExists: boolean
  autoCreatePolicy: PolicyKind
  objectMetadata: ObjectMetadataMap | undefined
  fileOverwrite: boolean
  backupBucket: string | undefined
  backupFormat: string | undefined
}

function toStorageConfigInput(
  use: UseSettings,
  connection: S3ConnectionSettings,
): StorageConfigInput {
  return {
    bucketName: use.bucketName,
    endpoint: connection.endpoint,
    useHttps: connection.useHttps,
    usePresignedUrls: use.usePresigned,
    autoCreateBucket: use.autoCreateBucket,
    assumeBucketExists: use.assumeBucketExists,
    autoCreatePolicy: use.autoCreatePolicy,
    fileOverwrite: use.fileOverwrite,
    ...(use.baseUrl && { baseUrl: use.baseUrl }),
    ...(use.objectMetadata && { objectMetadata: use.objectMetadata }),
    ...(use.backupBucket && { backupBucketName: use.backupBucket }),
    ...(use.backupFormat && { backupFormat: use.backupFormat }),
  }
}

export function toStorageSettings(env: StorageEnv): StorageSettings {
  const connection: S3ConnectionSettings = {
    endpoint: env.STORAGE_ENDPOINT,
    accessKey: env.STORAGE_ACCESS_KEY,
    secretKey: env.STORAGE_SECRET_KEY,
    region: env.STORAGE_REGION,
    useHttps: env.STORAGE_USE_HTTPS,
  }

  const media = toStorageConfigInput(
    {
      bucketName: env.STORAGE_MEDIA_BUCKET_NAME,
      baseUrl: env.STORAGE_MEDIA_BASE_URL,
      usePresigned: env.STORAGE_MEDIA_USE_PRESIGNED,
      autoCreateBucket: env.STORAGE_MEDIA_AUTO_CREATE_BUCKET,
      assumeBucketExists: env.STORAGE_MEDIA_ASSUME_BUCKET_EXISTS,
      autoCreatePolicy: env.STORAGE_MEDIA_AUTO_CREATE_POLICY,
      objectMetadata: env.STORAGE_MEDIA_OBJECT_METADATA,
      fileOverwrite: env.STORAGE_MEDIA_FILE_OVERWRITE,
      backupBucket: env.STORAGE_MEDIA_BACKUP_BUCKET,
      backupFormat: env.STORAGE_MEDIA_BACKUP_FORMAT,
    },
    connection,
  )

  const staticBucket = env.STORAGE_STATIC_BUCKET_NAME

  return {
    connection,
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
      serviceName: env.SERVICE_NAME,
    },
    media,
    ...(staticBucket && {
      static: toStorageConfigInput(
        {
          bucketName: staticBucket,
          baseUrl: env.STORAGE_STATIC_BASE_URL,
          usePresigned: env.STORAGE_STATIC_USE_PRESIGNED,
          autoCreateBucket: env.STORAGE_STATIC_AUTO_CREATE_BUCKET,
          assumeBucketExists: env.STORAGE_STATIC_ASSUME_BUCKET_EXISTS,
          autoCreatePolicy: env.STORAGE_STATIC_AUTO_CREATE_POLICY,
          objectMetadata: env.STORAGE_STATIC_OBJECT_METADATA,
          fileOverwrite: env.STORAGE_STATIC_FILE_OVERWRITE,
          backupBucket: env.STORAGE_STATIC_BACKUP_BUCKET,
          backupFormat: env.STORAGE_STATIC_BACKUP_FORMAT,
        },
        connection,
      ),
    }),
  }
}

/**
 * Reads `.env.<NODE_ENV>` (if present), then `env`, then `overrides`, and
 * validates the result. Throws `StorageConfigError` on invalid settings.
 */
export async function loadStorageSettings(
  env: Record<string, string | undefined> = process.env,
  options: LoadStorageSettingsOptions = {},
): Promise<LoadedStorageSettings> {
  const sources: SettingsSource[] = [
    new DotenvSource({
      file: `.env.${env.NODE_ENV ?? "development"}`,
      required: false,
      ...(options.cwd && { cwd: options.cwd }),
    }),
    new EnvSource({ env }),
    ...(options.overrides ? [new ObjectSource(options.overrides)] : []),
  ]

  const loaded = await loadSettings({ schema: storageEnvSchema, sources })

  return { settings: toStorageSettings(loaded.value), env: loaded }
}
