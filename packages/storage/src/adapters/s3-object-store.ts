import { Readable } from "node:stream"
import {
  type _Object,
  type Bucket,
  type CommonPrefix,
  CopyObjectCommand,
  CreateBucketCommand,
  DeleteBucketCommand,
  DeleteBucketPolicyCommand,
  DeleteObjectCommand,
  GetBucketPolicyCommand,
  GetObjectCommand,
  type GetObjectCommandOutput,
  HeadBucketCommand,
  HeadObjectCommand,
  ListBucketsCommand,
  ListObjectsV2Command,
  PutBucketPolicyCommand,
  type S3Client,
  S3ServiceException,
} from "@aws-sdk/client-s3"
import { Upload } from "@aws-sdk/lib-storage"
import { getSignedUrl } from "@aws-sdk/s3-request-presigner"
import {
  BucketError,
  BucketMissingError,
  BucketNotEmptyError,
  errorName,
  ObjectNotFoundError,
  StorageConfigError,
} from "../errors"
import type { Clock } from "../ports/clock"
import type { ObjectStoreClient } from "../ports/object-store-client"
import type {
  BucketInfo,
  BucketName,
  ObjectKey,
  ObjectRef,
  StorageData,
  StoredObject,
  StoredObjectMetadata,
} from "../ports/storage-object"
import type { ListOptions, PresignOptions, PutOptions } from "../ports/storage-options"
import type { ListResult } from "../ports/storage-result"

export interface S3ObjectStoreDeps {
  client: S3Client
  clock: Clock
  /**
   * Builds a client that signs for another origin (path-style). Needed only
   * for presigning with `signingEndpoint`.
   */
  createSigningClient?: (endpoint: URL) => S3Client
}

export class S3ObjectStore implements ObjectStoreClient {
  private readonly signingClients = new Map<string, S3Client>()

  constructor(readonly deps: S3ObjectStoreDeps) {}

  async bucketExists(bucket: BucketName): Promise<boolean> {
    try {
      await this.deps.client.send(new HeadBucketCommand({ Bucket: bucket }))
      return true
    } catch (err) {
      if (this.isNotFoundError(err)) return false
      throw err
    }
  }

  async createBucket(bucket: BucketName): Promise<void> {
    try {
      await this.deps.client.send(new CreateBucketCommand({ Bucket: bucket }))
    } catch (err) {
      throw this.translateError(err, bucket)
    }
  }

  async removeBucket(bucket: BucketName): Promise<void> {
    try {
      await this.deps.client.send(new DeleteBucketCommand({ Bucket: bucket }))
    } catch (err) {
      throw this.translateError(err, bucket)
    }
  }

  async listBuckets(): Promise<BucketInfo[]> {
    const response = await this.deps.client.send(new ListBucketsCommand({}))

    return (response.Buckets ?? [])
      .filter((bucket): bucket is Bucket & { Name: string } => Boolean(bucket.Name))
      .map((bucket) => ({
        name: bucket.Name,
        ...(bucket.CreationDate && { createdAt: bucket.CreationDate }),
      }))
  }

  async getBucketPolicy(bucket: BucketName): Promise<string | null> {
    try {
      const response = await this.deps.client.send(
        new GetBucketPolicyCommand({ Bucket: bucket }),
      )
      return response.Policy ?? null
    } catch (err) {
      if (errorName(err) === "NoSuchBucketPolicy") return null
      throw this.translateError(err, bucket)
    }
  }

  async setBucketPolicy(bucket: BucketName, policy: string): Promise<void> {
    try {
      await this.deps.client.send(new PutBucketPolicyCommand({ Bucket: bucket, Policy: policy }))
    } catch (err) {
      throw this.translateError(err, bucket)
    }
  }

  async deleteBucketPolicy(bucket: BucketName): Promise<void> {
    try {
      await this.deps.client.send(new DeleteBucketPolicyCommand({ Bucket: bucket }))
    } catch (err) {
      throw this.translateError(err, bucket)
    }
  }

  async putObject(ref: ObjectRef, data: StorageData, options?: PutOptions): Promise<void> {
    const upload = new Upload({
      client: this.deps.client,
      params: {
        Bucket: ref.bucket,
        Key: ref.key,
        Body: data,
        ...(options?.contentType && { ContentType: options.contentType }),
        ...(options?.metadata && { Metadata: options.metadata }),
      },
    })

    try {
      await upload.done()
    } catch (err) {
      throw this.translateError(err, ref.bucket)
    }
  }

  async getObject(ref: ObjectRef): Promise<StoredObject | null> {
    let response: GetObjectCommandOutput
    try {
      response = await this.deps.client.send(
        new GetObjectCommand({ Bucket: ref.bucket, Key: ref.key }),
      )
    } catch (err) {
      if (this.isNotFoundError(err) && errorName(err) !== "NoSuchBucket") return null
      throw this.translateError(err, ref.bucket)
    }

    return {
      ...this.toObjectMetadata(ref.key, response),
      body: await this.toReadable(response.Body),
    }
  }

  async statObject(ref: ObjectRef): Promise<StoredObjectMetadata | null> {
    try {
      const response = await this.deps.client.send(
        new HeadObjectCommand({ Bucket: ref.bucket, Key: ref.key }),
      )

      return this.toObjectMetadata(ref.key, response)
    } catch (err) {
      if (!this.isNotFoundError(err) || errorName(err) === "NoSuchBucket") {
        throw this.translateError(err, ref.bucket)
      }
      // HEAD responses carry no error body, so a missing bucket is a bare 404 too
      if (!(await this.bucketExists(ref.bucket))) {
        throw new BucketMissingError(ref.bucket, { cause: err })
      }
      return null
    }
  }

  async removeObject(ref: ObjectRef): Promise<void> {
    try {
      await this.deps.client.send(
        new DeleteObjectCommand({ Bucket: ref.bucket, Key: ref.key }),
      )
    } catch (err) {
      throw this.translateError(err, ref.bucket)
    }
  }

  async copyObject(src: ObjectRef, dst: ObjectRef): Promise<void> {
    const copySource = encodeURIComponent(`${src.bucket}/${src.key}`)

    try {
      await this.deps.client.send(
        new CopyObjectCommand({
          Bucket: dst.bucket,
          Key: dst.key,
          CopySource: copySource,
          MetadataDirective: "COPY",
        }),
      )
    } catch (err) {
      if (errorName(err) === "NoSuchKey") {
        throw new ObjectNotFoundError(src.bucket, src.key, { cause: err })
      }
      throw this.translateError(err, dst.bucket)
    }
  }

  async listObjects(bucket: BucketName, options?: ListOptions): Promise<ListResult> {
    try {
      const response = await this.deps.client.send(
        new ListObjectsV2Command({
          Bucket: bucket,
          ...(options?.prefix && { Prefix: options.prefix }),
          ...(options?.delimiter && { Delimiter: options.delimiter }),
          ...(options?.maxKeys !== undefined && { MaxKeys: options.maxKeys }),
          ...(options?.cursor && { ContinuationToken: options.cursor }),
        }),
      )

      return {
        objects: this.mapListContents(response.Contents),
        prefixes: this.mapListPrefixes(response.CommonPrefixes),
        ...(response.NextContinuationToken && { cursor: response.NextContinuationToken }),
      }
    } catch (err) {
      throw this.translateError(err, bucket)
    }
  }

  async presignGetObject(ref: ObjectRef, options?: PresignOptions): Promise<URL> {
    const headers = options?.responseHeaders
    const command = new GetObjectCommand({
      Bucket: ref.bucket,
      Key: ref.key,
      ...(headers?.contentType && { ResponseContentType: headers.contentType }),
      ...(headers?.contentDisposition && {
        ResponseContentDisposition: headers.contentDisposition,
      }),
      ...(headers?.cacheControl && { ResponseCacheControl: headers.cacheControl }),
      ...(headers?.contentLanguage && { ResponseContentLanguage: headers.contentLanguage }),
      ...(headers?.contentEncoding && { ResponseContentEncoding: headers.contentEncoding }),
    })

    const client = options?.signingEndpoint
      ? this.signingClientFor(options.signingEndpoint)
      : this.deps.client

    const url = await getSignedUrl(client, command, {
      ...(options?.expiresInSeconds !== undefined && { expiresIn: options.expiresInSeconds }),
    })

    return new URL(url)
  }

  private signingClientFor(endpoint: URL): S3Client {
    const { createSigningClient } = this.deps
    if (!createSigningClient) {
      throw new StorageConfigError(
        "Presigning for a public endpoint needs a createSigningClient dependency",
        { context: { endpoint: endpoint.origin } },
      )
    }

    let client = this.signingClients.get(endpoint.origin)
    if (!client) {
      client = createSigningClient(new URL(endpoint.origin))
      this.signingClients.set(endpoint.origin, client)
    }

    return client
  }

  private async toReadable(body: GetObjectCommandOutput["Body"]): Promise<Readable> {
    if (!body) return Readable.from([])
    if (body instanceof Readable) return body

    return Readable.from([Buffer.from(await body.transformToByteArray())])
  }

  private toObjectMetadata(
    key: ObjectKey,
    response: {
      ContentLength?: number | undefined
      LastModified?: Date | undefined
      ETag?: string | undefined
      ContentType?: string | undefined
      Metadata?: Record<string, string> | undefined
    },
  ): StoredObjectMetadata {
    return {
      key,
      sizeInBytes: response.ContentLength ?? 0,
      lastModified: response.LastModified ?? this.deps.clock.now(),
      metadata: { ...response.Metadata },
      ...(response.ETag && { etag: response.ETag }),
      ...(response.ContentType && { contentType: response.ContentType }),
    }
  }

  private mapListContents(contents: _Object[] | undefined): StoredObjectMetadata[] {
    if (!contents) return []

    return contents
      .filter((obj): obj is _Object & { Key: string } => Boolean(obj.Key))
      .map((obj) => ({
        key: obj.Key,
        sizeInBytes: obj.Size ?? 0,
        lastModified: obj.LastModified ?? this.deps.clock.now(),
        ...(obj.ETag && { etag: obj.ETag }),
      }))
  }

  private mapListPrefixes(commonPrefixes: CommonPrefix[] | undefined): string[] {
    if (!commonPrefixes) return []

    return commonPrefixes
      .map((p) => p.Prefix)
      .filter((p): p is string => Boolean(p))
  }

  private isNotFoundError(err: unknown): boolean {
    const name = errorName(err)
    if (name === "NotFound" || name === "NoSuchKey" || name === "NoSuchBucket") return true

    return err instanceof S3ServiceException && err.$metadata.httpStatusCode === 404
  }

  private translateError(err: unknown, bucket: BucketName): unknown {
    switch (errorName(err)) {
      case "NoSuchBucket":
        return new BucketMissingError(bucket, { cause: err })
      case "BucketNotEmpty":
        return new BucketNotEmptyError(bucket, { cause: err })
      case "BucketAlreadyExists":
      case "BucketAlreadyOwnedByYou":
        return new BucketError(`The bucket ${bucket} already exists`, bucket, { cause: err })
      default:
        return err
    }
  }
}
