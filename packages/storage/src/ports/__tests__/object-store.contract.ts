import { Readable } from "node:stream"
import { BucketMissingError, ObjectNotFoundError } from "../../errors"
import type { ObjectStoreClient } from "../object-store-client"
import type { BucketName } from "../storage-object"

async function readAll(body: Readable): Promise<string> {
  const chunks: Buffer[] = []
  for await (const chunk of body) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk))
  }
  return Buffer.concat(chunks).toString("utf-8")
}

export const describeObjectStoreContractTests = (
  name: string,
  createAdapter: () => Promise<{
    bucket: BucketName
    otherBucket: BucketName
    store: ObjectStoreClient
  }>,
  cleanup?: () => Promise<void>,
) => {
  describe(`ObjectStoreClient contract: ${name}`, () => {
    let store: ObjectStoreClient
    let bucket: BucketName
    let otherBucket: BucketName

    beforeAll(async () => {
      const setup = await createAdapter()

      store = setup.store
      bucket = setup.bucket
      otherBucket = setup.otherBucket
    })

    afterAll(async () => {
      await cleanup?.()
    })

    describe("buckets", () => {
      it("reports existing and missing buckets", async () => {
        expect(await store.bucketExists(bucket)).toBe(true)
        expect(await store.bucketExists("contract-never-created")).toBe(false)
      })

      it("creates, lists and removes a bucket", async () => {
        await store.createBucket("contract-scratch")

        expect((await store.listBuckets()).map((b) => b.name)).toContain("contract-scratch")

        await store.removeBucket("contract-scratch")
        expect(await store.bucketExists("contract-scratch")).toBe(false)
      })

      it("stores, replaces and deletes a bucket policy", async () => {
        await store.createBucket("contract-policy")
        expect(await store.getBucketPolicy("contract-policy")).toBeNull()

        const policy = JSON.stringify({
          Version: "2012-10-17",
          Statement: [
            {
              Sid: "",
              Effect: "Allow",
              Principal: { AWS: "*" },
              Action: "s3:GetObject",
              Resource: "arn:aws:s3:::contract-policy/*",
            },
          ],
        })
        await store.setBucketPolicy("contract-policy", policy)
        expect(JSON.parse((await store.getBucketPolicy("contract-policy")) ?? "{}")).toEqual(
          JSON.parse(policy),
        )

        await store.deleteBucketPolicy("contract-policy")
        expect(await store.getBucketPolicy("contract-policy")).toBeNull()

        await store.removeBucket("contract-policy")
      })
    })

    describe("putObject / getObject / statObject", () => {
      it("stores and retrieves an object", async () => {
        const ref = { bucket, key: "contract/basic.txt" }
        const data = Buffer.from("hello world")

        await store.putObject(ref, data, { contentType: "text/plain" })

        const obj = await store.getObject(ref)
        expect(obj).toMatchObject({
          key: ref.key,
          contentType: "text/plain",
          sizeInBytes: data.length,
          body: expect.any(Readable),
          lastModified: expect.any(Date),
        })
        expect(await readAll(obj!.body)).toBe("hello world")
      })

      it("accepts Readable stream as input", async () => {
        const ref = { bucket, key: "contract/stream-input.txt" }

        await store.putObject(ref, Readable.from(Buffer.from("stream input")))

        const meta = await store.statObject(ref)
        expect(meta!.sizeInBytes).toBe(12)
      })

      it("accepts Uint8Array as input", async () => {
        const ref = { bucket, key: "contract/uint8.txt" }

        await store.putObject(ref, new Uint8Array([104, 101, 108, 108, 111]))

        const obj = await store.getObject(ref)
        expect(await readAll(obj!.body)).toBe("hello")
      })

      it("handles an empty object", async () => {
        const ref = { bucket, key: "contract/empty.txt" }
        await store.putObject(ref, Buffer.alloc(0))

        expect((await store.statObject(ref))!.sizeInBytes).toBe(0)
      })

      it("statObject returns metadata without body", async () => {
        const ref = { bucket, key: "contract/stat.txt" }
        await store.putObject(ref, Buffer.from("stat test"), { metadata: { owner: "ops" } })

        const meta = await store.statObject(ref)
        expect(meta).toMatchObject({ key: ref.key, sizeInBytes: 9, metadata: { owner: "ops" } })
        expect(meta).not.toHaveProperty("body")
      })

      it("returns null for missing objects", async () => {
        const ref = { bucket, key: "contract/missing.txt" }

        expect(await store.getObject(ref)).toBeNull()
        expect(await store.statObject(ref)).toBeNull()
      })

      it("overwrites an existing object", async () => {
        const ref = { bucket, key: "contract/overwrite.txt" }
        await store.putObject(ref, Buffer.from("v1"))
        await store.putObject(ref, Buffer.from("version2"))

        expect((await store.statObject(ref))!.sizeInBytes).toBe(8)
      })

      it("handles unicode and spaces in keys", async () => {
        const ref = { bucket, key: "contract/weird & ÜRΛ/文件.txt" }
        await store.putObject(ref, Buffer.from("unicode"))

        expect(await store.statObject(ref)).not.toBeNull()
      })

      it("rejects writes to a missing bucket", async () => {
        const ref = { bucket: "contract-never-created", key: "a.txt" }

        await expect(store.putObject(ref, Buffer.from("x"))).rejects.toBeInstanceOf(
          BucketMissingError,
        )
      })
    })

    describe("removeObject", () => {
      it("removes an existing object", async () => {
        const ref = { bucket, key: "contract/delete-me.txt" }
        await store.putObject(ref, Buffer.from("delete"))

        await store.removeObject(ref)

        expect(await store.statObject(ref)).toBeNull()
      })

      it("is a no-op for a missing object", async () => {
        await expect(
          store.removeObject({ bucket, key: "contract/never-existed.txt" }),
        ).resolves.toBeUndefined()
      })
    })

    describe("copyObject", () => {
      it("copies bytes, content type and metadata across buckets", async () => {
        const src = { bucket, key: "contract/copy-src.txt" }
        const dst = { bucket: otherBucket, key: "archive/copy-dst.txt" }
        await store.putObject(src, Buffer.from("copy me"), {
          contentType: "text/plain",
          metadata: { foo: "bar" },
        })

        await store.copyObject(src, dst)

        const copied = await store.getObject(dst)
        expect(copied).toMatchObject({ contentType: "text/plain", metadata: { foo: "bar" } })
        expect(await readAll(copied!.body)).toBe("copy me")
        expect(await store.statObject(src)).not.toBeNull()
      })

      it("fails with ObjectNotFoundError for a missing source", async () => {
        const src = { bucket, key: "contract/copy-missing.txt" }
        const dst = { bucket: otherBucket, key: "copy-missing.txt" }

        await expect(store.copyObject(src, dst)).rejects.toBeInstanceOf(ObjectNotFoundError)
      })
    })

    describe("listObjects", () => {
      beforeAll(async () => {
        await store.putObject({ bucket, key: "list/a.txt" }, Buffer.from("a"))
        await store.putObject({ bucket, key: "list/b.txt" }, Buffer.from("b"))
        await store.putObject({ bucket, key: "list/nested/c.txt" }, Buffer.from("c"))
      })

      it("lists all objects under a prefix", async () => {
        const result = await store.listObjects(bucket, { prefix: "list/" })

        expect(result.objects.map((o) => o.key)).toEqual([
          "list/a.txt",
          "list/b.txt",
          "list/nested/c.txt",
        ])
        expect(result.prefixes).toEqual([])
      })

      it("groups by delimiter", async () => {
        const result = await store.listObjects(bucket, { prefix: "list/", delimiter: "/" })

        expect(result.objects.map((o) => o.key)).toEqual(["list/a.txt", "list/b.txt"])
        expect(result.prefixes).toEqual(["list/nested/"])
      })

      it("paginates with a cursor", async () => {
        const page1 = await store.listObjects(bucket, { prefix: "list/", maxKeys: 2 })
        expect(page1.objects.map((o) => o.key)).toEqual(["list/a.txt", "list/b.txt"])
        expect(page1.cursor).toBeDefined()

        const page2 = await store.listObjects(bucket, {
          prefix: "list/",
          maxKeys: 2,
          cursor: page1.cursor!,
        })
        expect(page2.objects.map((o) => o.key)).toEqual(["list/nested/c.txt"])
        expect(page2.cursor).toBeUndefined()
      })

      it("returns an empty page for no matches", async () => {
        const result = await store.listObjects(bucket, { prefix: "nonexistent-prefix/" })

        expect(result).toEqual({ objects: [], prefixes: [] })
      })
    })

    describe("presignGetObject", () => {
      it("returns a URL naming the bucket and encoded key", async () => {
        const url = await store.presignGetObject(
          { bucket, key: "contract/presign me.txt" },
          { expiresInSeconds: 60 },
        )

        expect(url).toBeInstanceOf(URL)
        expect(url.pathname).toBe(`/${bucket}/contract/presign%20me.txt`)
        expect(url.searchParams.get("X-Amz-Expires")).toBe("60")
      })

      it("signs for the requested endpoint", async () => {
        const url = await store.presignGetObject(
          { bucket, key: "contract/cdn.txt" },
          { signingEndpoint: new URL("https://cdn.example.com") },
        )

        expect(url.origin).toBe("https://cdn.example.com")
      })
    })
  })
}
