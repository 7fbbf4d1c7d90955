import { StorageConfigError } from "../../../errors"
import type { PolicyKind } from "../../../ports/policy-kind"
import { resolveStorageConfig } from "../resolve-storage-config"

describe("resolveStorageConfig", () => {
  it("applies defaults", () => {
    expect(resolveStorageConfig({ bucketName: " media ", endpoint: "localhost:9000" })).toEqual({
      bucketName: "media",
      endpoint: "localhost:9000",
      useHttps: true,
      usePresignedUrls: false,
      autoCreateBucket: false,
      assumeBucketExists: false,
      autoCreatePolicy: "NONE",
      objectMetadata: {},
      fileOverwrite: true,
    })
  })

  it("freezes the result", () => {
    const config = resolveStorageConfig({
      bucketName: "media",
      endpoint: "localhost:9000",
      objectMetadata: { owner: "ops" },
    })

    expect(Object.isFrozen(config)).toBe(true)
    expect(Object.isFrozen(config.objectMetadata)).toBe(true)
  })

  it("rejects an empty bucket name", () => {
    expect(() => resolveStorageConfig({ bucketName: "  ", endpoint: "x" })).toThrow(
      "Bucket name must not be empty",
    )
  })

  it("requires backup bucket and format together", () => {
    expect(() =>
      resolveStorageConfig({ bucketName: "media", endpoint: "x", backupBucketName: "archive" }),
    ).toThrow(StorageConfigError)
    expect(() =>
      resolveStorageConfig({ bucketName: "media", endpoint: "x", backupFormat: "%Y/" }),
    ).toThrow(StorageConfigError)

    expect(
      resolveStorageConfig({
        bucketName: "media",
        endpoint: "x",
        backupBucketName: " archive ",
        backupFormat: "%Y/",
      }),
    ).toMatchObject({ backupBucketName: "archive", backupFormat: "%Y/" })
  })

  it("rejects unknown policies", () => {
    const input = { bucketName: "media", endpoint: "x", autoCreatePolicy: "PUBLIC" }

    // Settings can arrive untyped from outside.
    expect(() =>
      resolveStorageConfig({ ...input, autoCreatePolicy: input.autoCreatePolicy as PolicyKind }),
    ).toThrow("Unknown bucket policy: PUBLIC")
  })

  describe("endpoint", () => {
    it("drops a trailing slash", () => {
      expect(resolveStorageConfig({ bucketName: "m", endpoint: "minio:9000/" }).endpoint).toBe(
        "minio:9000",
      )
    })

    it("rejects a scheme", () => {
      expect(() =>
        resolveStorageConfig({ bucketName: "m", endpoint: "http://minio:9000" }),
      ).toThrow(StorageConfigError)
    })
  })

  describe("baseUrl", () => {
    it.each([
      ["https://cdn.example.com/", "https://cdn.example.com"],
      ["https://cdn.example.com/media//", "https://cdn.example.com/media"],
      ["http://localhost:8080/a/b", "http://localhost:8080/a/b"],
    ])("%s -> %s", (raw, expected) => {
      expect(resolveStorageConfig({ bucketName: "m", baseUrl: raw }).baseUrl).toBe(expected)
    })

    it.each(["cdn.example.com/media", "ftp://cdn.example.com", "https://cdn.example.com/?v=1"])(
      "rejects %s",
      (raw) => {
        expect(() => resolveStorageConfig({ bucketName: "m", baseUrl: raw })).toThrow(
          StorageConfigError,
        )
      },
    )
  })

  it("needs an endpoint or base URL for direct URLs only", () => {
    expect(() => resolveStorageConfig({ bucketName: "m" })).toThrow(
      "Direct URLs need either a base URL or an endpoint",
    )
    expect(resolveStorageConfig({ bucketName: "m", usePresignedUrls: true }).usePresignedUrls).toBe(
      true,
    )
  })
})
