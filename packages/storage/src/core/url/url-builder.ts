import { StorageConfigError } from "../../errors"
import type { ObjectStoreClient } from "../../ports/object-store-client"
import type { StorageConfig } from "../../ports/storage-config"
import type { ObjectKey } from "../../ports/storage-object"
import type { UrlOptions } from "../../ports/storage-options"
import { encodeKey, joinUrl } from "../path/object-name"

export interface UrlBuilderDeps {
  store: ObjectStoreClient
}

export type UrlBuilderOptions = Pick<
  StorageConfig,
  "bucketName" | "endpoint" | "useHttps" | "baseUrl" | "usePresignedUrls"
>

export class UrlBuilder {
  constructor(
    private readonly deps: UrlBuilderDeps,
    private readonly options: UrlBuilderOptions,
  ) {}

  async buildUrl(key: ObjectKey, options?: UrlOptions): Promise<URL> {
    if (!this.options.usePresignedUrls) return this.directUrl(key)

    return this.presignedUrl(key, options)
  }

  /** Public URL of `key`. Makes no store call. */
  directUrl(key: ObjectKey): URL {
    return new URL(joinUrl(this.directBase(), encodeKey(key)))
  }

  private directBase(): string {
    if (this.options.baseUrl !== undefined) return this.options.baseUrl

    if (this.options.endpoint === undefined) {
      throw new StorageConfigError("Direct URLs need either a base URL or an endpoint", {
        context: { bucket: this.options.bucketName },
      })
    }

    const scheme = this.options.useHttps ? "https" : "http"
    return `${scheme}://${this.options.endpoint}/${this.options.bucketName}`
  }

  private async presignedUrl(key: ObjectKey, options?: UrlOptions): Promise<URL> {
    const baseUrl = this.options.baseUrl === undefined ? undefined : new URL(this.options.baseUrl)

    const signed = await this.deps.store.presignGetObject(
      { bucket: this.options.bucketName, key },
      {
        ...(options?.maxAge !== undefined && { expiresInSeconds: options.maxAge }),
        ...(options?.responseHeaders && { responseHeaders: options.responseHeaders }),
        ...(baseUrl && { signingEndpoint: new URL(baseUrl.origin) }),
      },
    )

    if (!baseUrl) return signed

    return this.rebase(signed, baseUrl)
  }

  /**
   * Moves a path-style signed URL under the base URL's path. The origin is
   * left alone: it was part of the signature.
   */
  private rebase(signed: URL, baseUrl: URL): URL {
    const bucketPath = `/${this.options.bucketName}/`

    if (signed.origin !== baseUrl.origin || !signed.pathname.startsWith(bucketPath)) {
      throw new StorageConfigError(
        "Presigned URL was not signed path-style for the base URL origin",
        { context: { bucket: this.options.bucketName, baseUrl: baseUrl.href } },
      )
    }

    const rebased = new URL(signed.href)
    rebased.pathname = joinUrl(
      baseUrl.pathname,
      signed.pathname.slice(bucketPath.length),
    )

    return rebased
  }
}
