import type { ObjectKey } from "../../ports/storage-object"

/**
 * Canonical object key for a caller-supplied name: runs of "/" collapse,
 * "." segments drop, the leading "/" goes and a trailing "/" stays.
 * Idempotent.
 */
export function normalizeName(name: string): ObjectKey {
  const segments = name.split("/").filter((segment) => segment !== "" && segment !== ".")
  const joined = segments.join("/")

  if (joined && name.endsWith("/")) return `${joined}/`
  return joined
}

/** "" for the root, otherwise the normalized path with exactly one trailing "/". */
export function toListingPrefix(path = ""): string {
  const normalized = normalizeName(path)
  if (!normalized) return ""

  return normalized.endsWith("/") ? normalized : `${normalized}/`
}

/** Percent-encodes each path segment, keeping the "/" separators. */
export function encodeKey(key: ObjectKey): string {
  return key.split("/").map(encodeURIComponent).join("/")
}

/** Joins URL parts with exactly one "/" between them. */
export function joinUrl(base: string, ...parts: string[]): string {
  return parts.reduce(
    (url, part) => `${url.replace(/\/+$/, "")}/${part.replace(/^\/+/, "")}`,
    base,
  )
}

/**
 * "dir/photo.jpg" with suffix "x1" becomes "dir/photo_x1.jpg". Only the
 * last extension counts; a leading dot does not start one.
 */
export function withNameSuffix(key: ObjectKey, suffix: string): ObjectKey {
  const slash = key.lastIndexOf("/")
  const dir = key.slice(0, slash + 1)
  const base = key.slice(slash + 1)

  const dot = base.lastIndexOf(".")
  if (dot <= 0) return `${dir}${base}_${suffix}`

  return `${dir}${base.slice(0, dot)}_${suffix}${base.slice(dot)}`
}
