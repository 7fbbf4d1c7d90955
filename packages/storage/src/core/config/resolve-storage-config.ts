import { StorageConfigError } from "../../errors"
import { isPolicyKind } from "../../ports/policy-kind"
import type { StorageConfig, StorageConfigInput } from "../../ports/storage-config"

function fail(message: string, context: Record<string, unknown> = {}): never {
  throw new StorageConfigError(message, { context })
}

function resolveBaseUrl(raw: string | undefined): string | undefined {
  if (raw === undefined || raw.trim() === "") return undefined

  let url: URL
  try {
    url = new URL(raw.trim())
  } catch (err) {
    throw new StorageConfigError(`Base URL is not an absolute URL: ${raw}`, {
      context: { baseUrl: raw },
      cause: err,
    })
  }

  if (url.protocol !== "http:" && url.protocol !== "https:") {
    fail(`Base URL must use http or https: ${raw}`, { baseUrl: raw })
  }
  if (url.search || url.hash) {
    fail(`Base URL must not carry a query or fragment: ${raw}`, { baseUrl: raw })
  }

  return `${url.origin}${url.pathname}`.replace(/\/+$/, "")
}

function resolveEndpoint(raw: string | undefined): string | undefined {
  if (raw === undefined || raw.trim() === "") return undefined
  if (raw.includes("://")) fail(`Endpoint must be host[:port] without a scheme: ${raw}`)

  return raw.trim().replace(/\/+$/, "")
}

/**
 * Applies defaults and checks invariants. Throws `StorageConfigError`
 * so misconfiguration surfaces at construction.
 */
export function resolveStorageConfig(input: StorageConfigInput): StorageConfig {
  const bucketName = input.bucketName.trim()
  if (!bucketName) fail("Bucket name must not be empty")

  const hasBackupBucket = Boolean(input.backupBucketName?.trim())
  const hasBackupFormat = Boolean(input.backupFormat)
  if (hasBackupBucket !== hasBackupFormat) {
    fail("Backup bucket and backup format must be set together", {
      bucket: bucketName,
      backupBucketName: input.backupBucketName,
      backupFormat: input.backupFormat,
    })
  }

  const autoCreatePolicy = input.autoCreatePolicy ?? "NONE"
  if (!isPolicyKind(autoCreatePolicy)) {
    fail(`Unknown bucket policy: ${String(autoCreatePolicy)}`, { bucket: bucketName })
  }

  const endpoint = resolveEndpoint(input.endpoint)
  const baseUrl = resolveBaseUrl(input.baseUrl)
  const usePresignedUrls = input.usePresignedUrls ?? false

  if (!usePresignedUrls && baseUrl === undefined && endpoint === undefined) {
    fail("Direct URLs need either a base URL or an endpoint", { bucket: bucketName })
  }

  return Object.freeze({
    bucketName,
    useHttps: input.useHttps ?? true,
    usePresignedUrls,
    autoCreateBucket: input.autoCreateBucket ?? false,
    assumeBucketExists: input.assumeBucketExists ?? false,
    autoCreatePolicy,
    objectMetadata: Object.freeze({ ...input.objectMetadata }),
    fileOverwrite: input.fileOverwrite ?? true,
    ...(endpoint !== undefined && { endpoint }),
    ...(baseUrl !== undefined && { baseUrl }),
    ...(hasBackupBucket &&
      input.backupBucketName !== undefined &&
      input.backupFormat !== undefined && {
        backupBucketName: input.backupBucketName.trim(),
        backupFormat: input.backupFormat,
      }),
  })
}
