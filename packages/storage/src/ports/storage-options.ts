import type { ObjectMetadataMap } from "./storage-object"
import type { Seconds } from "./time"

export interface PutOptions {
  contentType?: string
  metadata?: ObjectMetadataMap
}

export interface ListOptions {
  /** Only keys starting with this prefix (e.g. "photos/") */
  prefix?: string

  /** Groups keys into common prefixes (typically "/") */
  delimiter?: string

  /** Max entries (objects plus prefixes) per page */
  maxKeys?: number

  /** Opaque token from a previous ListResult */
  cursor?: string
}

/** Response header overrides baked into a presigned GET. */
export interface ResponseHeaderOverrides {
  contentType?: string
  contentDisposition?: string
  cacheControl?: string
  contentLanguage?: string
  contentEncoding?: string
}

export interface PresignOptions {
  expiresInSeconds?: Seconds
  responseHeaders?: ResponseHeaderOverrides

  /**
   * Origin the signature is computed for. When set the URL is signed for
   * this host instead of the client's endpoint, path-style.
   */
  signingEndpoint?: URL
}

export interface SaveOptions {
  contentType?: string
  /** Merged over the configured default metadata; these win. */
  metadata?: ObjectMetadataMap
}

export interface UrlOptions {
  /** Lifetime of a presigned URL. Ignored for direct URLs. */
  maxAge?: Seconds
  responseHeaders?: ResponseHeaderOverrides
}
