import contentTypes from "./content-types.json"

export const DEFAULT_CONTENT_TYPE = "application/octet-stream"

const byExtension = new Map<string, string>(Object.entries(contentTypes))

/** Content type for the key's extension, if it is a known one. */
export function guessContentType(key: string): string | undefined {
  const base = key.slice(key.lastIndexOf("/") + 1)
  const dot = base.lastIndexOf(".")
  if (dot <= 0) return undefined

  return byExtension.get(base.slice(dot + 1).toLowerCase())
}
