import type { Logger } from "@stowage/logger"
import { BucketError, BucketMissingError, isStorageError, type StorageError } from "../../errors"
import type { ObjectStoreClient } from "../../ports/object-store-client"
import type { StorageConfig } from "../../ports/storage-config"
import { serializePolicy, toNativePolicy } from "../policy/bucket-policy"

export type ProvisionState =
  | { status: "uninitialized" }
  | { status: "pending"; promise: Promise<void> }
  | { status: "ready" }
  | { status: "failed"; error: StorageError }

export interface BucketProvisionerDeps {
  store: ObjectStoreClient
  logger: Logger
}

export type BucketProvisionerOptions = Pick<
  StorageConfig,
  "bucketName" | "autoCreateBucket" | "assumeBucketExists" | "autoCreatePolicy"
>

/**
 * Makes sure the bucket exists, once. The first `ensure()` starts the
 * check; later and concurrent calls share its outcome, failures included.
 *
 * The policy is applied only to a bucket created here. An existing bucket
 * keeps whatever policy it has.
 */
export class BucketProvisioner {
  private state: ProvisionState = { status: "uninitialized" }

  constructor(
    private readonly deps: BucketProvisionerDeps,
    private readonly options: BucketProvisionerOptions,
  ) {}

  get status(): ProvisionState["status"] {
    return this.state.status
  }

  ensure(): Promise<void> {
    switch (this.state.status) {
      case "ready":
        return Promise.resolve()
      case "failed":
        return Promise.reject(this.state.error)
      case "pending":
        return this.state.promise
      case "uninitialized": {
        const promise = this.provision().then(
          () => {
            this.state = { status: "ready" }
          },
          (err: unknown) => {
            const error = isStorageError(err)
              ? err
              : new BucketError(
                  `Could not provision bucket ${this.options.bucketName}`,
                  this.options.bucketName,
                  { cause: err },
                )
            this.state = { status: "failed", error }
            this.deps.logger.error("bucket provisioning failed", {
              operation: "provision",
              err: error,
            })
            throw error
          },
        )

        this.state = { status: "pending", promise }
        return promise
      }
    }
  }

  private async provision(): Promise<void> {
    const { bucketName: bucket, autoCreatePolicy } = this.options

    if (this.options.assumeBucketExists) {
      this.deps.logger.debug("bucket assumed to exist", { operation: "provision" })
      return
    }

    const exists = await this.call(`Could not check bucket ${bucket}`, () =>
      this.deps.store.bucketExists(bucket),
    )
    if (exists) return

    if (!this.options.autoCreateBucket) throw new BucketMissingError(bucket)

    await this.call(`Could not create bucket ${bucket}`, () =>
      this.deps.store.createBucket(bucket),
    )
    this.deps.logger.info("bucket created", { operation: "provision" })

    const policy = toNativePolicy(bucket, autoCreatePolicy)
    if (!policy) return

    await this.call(`Could not set policy on bucket ${bucket}`, () =>
      this.deps.store.setBucketPolicy(bucket, serializePolicy(policy)),
    )
    this.deps.logger.info("bucket policy applied", {
      operation: "provision",
      policy: autoCreatePolicy,
    })
  }

  private async call<T>(message: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn()
    } catch (err) {
      throw new BucketError(message, this.options.bucketName, { cause: err })
    }
  }
}
