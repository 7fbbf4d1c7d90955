import { vi } from "vitest"
import { FakeClock } from "../../../adapters/fake-clock"
import { MemoryObjectStore } from "../../../adapters/memory-object-store"
import { StorageConfigError } from "../../../errors"
import { UrlBuilder, type UrlBuilderOptions } from "../url-builder"

describe("UrlBuilder", () => {
  let clock: FakeClock
  let store: MemoryObjectStore

  beforeEach(async () => {
    clock = new FakeClock(Date.UTC(2024, 0, 1))
    store = new MemoryObjectStore({ clock }, { signingSecret: "test-secret" })
    await store.createBucket("bar")
    await store.createBucket("foo")
  })

  const builder = (options: Partial<UrlBuilderOptions> & Pick<UrlBuilderOptions, "bucketName">) =>
    new UrlBuilder({ store }, { useHttps: true, usePresignedUrls: false, ...options })

  describe("direct", () => {
    it("builds from the endpoint and bucket", async () => {
      const urls = builder({ bucketName: "foo", endpoint: "localhost:9000", useHttps: false })

      expect((await urls.buildUrl("22")).href).toBe("http://localhost:9000/foo/22")
    })

    it("uses https by default", () => {
      const urls = builder({ bucketName: "foo", endpoint: "s3.example.com" })

      expect(urls.directUrl("a.txt").href).toBe("https://s3.example.com/foo/a.txt")
    })

    it("prefers the base URL", async () => {
      const urls = builder({
        bucketName: "foo",
        endpoint: "localhost:9000",
        baseUrl: "https://example23.com/foo",
      })

      expect((await urls.buildUrl("1/2/3/4")).href).toBe("https://example23.com/foo/1/2/3/4")
    })

    it("encodes key segments", () => {
      const urls = builder({ bucketName: "foo", baseUrl: "https://cdn.example.com" })

      expect(urls.directUrl("my docs/report #1.pdf").href).toBe(
        "https://cdn.example.com/my%20docs/report%20%231.pdf",
      )
    })

    it("makes no store call", async () => {
      const presign = vi.spyOn(store, "presignGetObject")

      await builder({ bucketName: "foo", endpoint: "localhost:9000" }).buildUrl("a")

      expect(presign).not.toHaveBeenCalled()
    })

    it("needs a base URL or an endpoint", async () => {
      await expect(builder({ bucketName: "foo" }).buildUrl("a")).rejects.toBeInstanceOf(
        StorageConfigError,
      )
    })
  })

  describe("presigned", () => {
    it("signs against the store endpoint without a base URL", async () => {
      const url = await builder({ bucketName: "bar", usePresignedUrls: true }).buildUrl("1")

      expect(url.origin).toBe("http://localhost:9000")
      expect(url.pathname).toBe("/bar/1")
      expect(store.verifyPresignedUrl(url)).toBe(true)
    })

    it("signs for the base URL origin and moves the path under it", async () => {
      const presign = vi.spyOn(store, "presignGetObject")
      const urls = builder({
        bucketName: "bar",
        usePresignedUrls: true,
        baseUrl: "http://example11.com/foo",
      })

      const url = await urls.buildUrl("1")

      expect(url.origin).toBe("http://example11.com")
      expect(url.pathname).toBe("/foo/1")
      expect(url.searchParams.get("X-Amz-Signature")).toMatch(/^[0-9a-f]{64}$/)
      expect(presign).toHaveBeenCalledWith(
        { bucket: "bar", key: "1" },
        { signingEndpoint: new URL("http://example11.com") },
      )
    })

    it("yields a verifiable URL when the base path is the bucket", async () => {
      const urls = builder({
        bucketName: "bar",
        usePresignedUrls: true,
        baseUrl: "https://cdn.example.com/bar",
      })

      const url = await urls.buildUrl("photos/cat.jpg")

      expect(url.href.startsWith("https://cdn.example.com/bar/photos/cat.jpg?")).toBe(true)
      expect(store.verifyPresignedUrl(url)).toBe(true)
    })

    it("passes expiry and response headers", async () => {
      const urls = builder({ bucketName: "bar", usePresignedUrls: true })

      const url = await urls.buildUrl("report.pdf", {
        maxAge: 60,
        responseHeaders: { contentDisposition: "attachment" },
      })

      expect(url.searchParams.get("X-Amz-Expires")).toBe("60")
      expect(url.searchParams.get("response-content-disposition")).toBe("attachment")
      clock.advance(60_001)
      expect(store.verifyPresignedUrl(url)).toBe(false)
    })

    it("rejects a URL that is not path-style for the base origin", async () => {
      vi.spyOn(store, "presignGetObject").mockResolvedValueOnce(
        new URL("http://bar.example11.com/1?X-Amz-Signature=00"),
      )
      const urls = builder({
        bucketName: "bar",
        usePresignedUrls: true,
        baseUrl: "http://example11.com/foo",
      })

      await expect(urls.buildUrl("1")).rejects.toBeInstanceOf(StorageConfigError)
    })
  })
})
