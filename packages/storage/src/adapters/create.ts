import { S3Client } from "@aws-sdk/client-s3"
import type { Clock } from "../ports/clock"
import { MemoryObjectStore, type MemoryObjectStoreOptions } from "./memory-object-store"
import { S3ObjectStore } from "./s3-object-store"

export type S3ConnectionSettings = {
  /** host[:port], no scheme */
  endpoint: string
  accessKey: string
  secretKey: string
  useHttps: boolean
  region: string
}

export interface CreateS3ObjectStoreOptions {
  connection: S3ConnectionSettings
  clock: Clock
}

function createS3Client(endpoint: string, connection: S3ConnectionSettings): S3Client {
  return new S3Client({
    region: connection.region,
    endpoint,
    forcePathStyle: true,
    credentials: {
      accessKeyId: connection.accessKey,
      secretAccessKey: connection.secretKey,
    },
  })
}

/** Path-style S3 store; presigning for a base URL gets its own client per origin. */
export function createS3ObjectStore(options: CreateS3ObjectStoreOptions): S3ObjectStore {
  const { connection, clock } = options
  const scheme = connection.useHttps ? "https" : "http"

  return new S3ObjectStore({
    client: createS3Client(`${scheme}://${connection.endpoint}`, connection),
    clock,
    createSigningClient: (endpoint) => createS3Client(endpoint.origin, connection),
  })
}

export interface CreateMemoryObjectStoreOptions extends MemoryObjectStoreOptions {
  clock: Clock
}

export function createMemoryObjectStore(
  options: CreateMemoryObjectStoreOptions,
): MemoryObjectStore {
  const { clock, ...storeOptions } = options

  return new MemoryObjectStore({ clock }, storeOptions)
}
