import {
  BucketMissingError,
  ObjectNotFoundError,
  StorageConfigError,
  TransportError,
} from "../errors"
import { serializeError, StorageError } from "../storage-error"
import { errorName, isStorageError, toStorageError } from "../utils"

describe("StorageError", () => {
  it("carries code, frozen context and flags", () => {
    const error = new ObjectNotFoundError("media", "a.txt", { context: { operation: "open" } })

    expect(error).toBeInstanceOf(StorageError)
    expect(error.name).toBe("ObjectNotFoundError")
    expect(error.code).toBe("object_not_found")
    expect(error.message).toBe("No object a.txt in bucket media")
    expect(error.context).toEqual({ operation: "open", bucket: "media", key: "a.txt" })
    expect(Object.isFrozen(error.context)).toBe(true)
    expect(error.isOperational).toBe(true)
    expect(error.isRetryable).toBe(false)
  })

  it("marks config errors non-operational and transport errors retryable", () => {
    expect(new StorageConfigError("bad").isOperational).toBe(false)
    expect(new TransportError("down").isRetryable).toBe(true)
  })
})

describe("serializeError", () => {
  it("follows the cause chain", () => {
    const cause = new Error("socket hang up")
    const error = new TransportError("save failed", { context: { key: "a.txt" }, cause })

    const serialized = serializeError(error)

    expect(serialized).toMatchObject({
      name: "TransportError",
      code: "transport_error",
      message: "save failed",
      context: { key: "a.txt" },
      isRetryable: true,
      cause: { name: "Error", code: "unknown", message: "socket hang up" },
    })
    expect(serialized.stack).toBeUndefined()
    expect(serialized.timestamp).toBe(error.timestamp.toISOString())
  })

  it("includes stacks on request", () => {
    expect(serializeError(new BucketMissingError("media"), { includeStack: true }).stack).toContain(
      "BucketMissingError",
    )
  })

  it("handles thrown non-errors", () => {
    expect(serializeError("nope")).toMatchObject({
      name: "NonErrorThrown",
      message: "nope",
      context: { value: "nope" },
    })
  })

  it("is what JSON.stringify emits", () => {
    const error = new BucketMissingError("media")

    expect(JSON.parse(JSON.stringify(error))).toEqual(serializeError(error))
  })
})

describe("toStorageError", () => {
  it("passes storage errors through", () => {
    const error = new BucketMissingError("media")

    expect(toStorageError(error, "ignored")).toBe(error)
  })

  it("wraps anything else in a TransportError", () => {
    const cause = new Error("ECONNREFUSED")
    const wrapped = toStorageError(cause, "open failed", { key: "a.txt" })

    expect(wrapped).toBeInstanceOf(TransportError)
    expect(wrapped.message).toBe("open failed")
    expect(wrapped.context).toEqual({ key: "a.txt" })
    expect(wrapped.cause).toBe(cause)
    expect(isStorageError(wrapped)).toBe(true)
  })

  it("reads error names", () => {
    expect(errorName(Object.assign(new Error("x"), { name: "NoSuchKey" }))).toBe("NoSuchKey")
    expect(errorName("x")).toBeUndefined()
  })
})
