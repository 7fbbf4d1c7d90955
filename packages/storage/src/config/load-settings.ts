import { type ZodType, z } from "zod"
import { StorageConfigError } from "../errors"
import { LoadedSettings } from "./loaded-settings"
import type { SettingsSource } from "./settings-source"
import { EnvSource } from "./sources/env-source"

export type LoadSettingsOptions<T extends Record<string, unknown>> = {
  schema: ZodType<T>
  /** Default: the process environment */
  sources?: SettingsSource[]
}

export async function loadSettings<T extends Record<string, unknown>>({
  schema,
  sources,
}: LoadSettingsOptions<T>): Promise<LoadedSettings<T>> {
  const merged: Record<string, unknown> = {}
  const provenance: Record<string, string> = {}
  const sourcesUsed: string[] = []

  for (const source of sources ?? [new EnvSource()]) {
    for (const [key, value] of Object.entries(await source.load())) {
      if (value === undefined) continue

      merged[key] = value
      provenance[key] = source.name
      if (!sourcesUsed.includes(source.name)) sourcesUsed.push(source.name)
    }
  }

  const result = schema.safeParse(merged)
  if (!result.success) {
    throw new StorageConfigError(
      `Settings validation failed:\n${z.prettifyError(result.error)}`,
      { context: { sources: sourcesUsed } },
    )
  }

  const known = new Set(Object.keys(result.data))
  for (const key of Object.keys(provenance)) {
    if (!known.has(key)) delete provenance[key]
  }

  return new LoadedSettings<T>(result.data, {
    provenance,
    sourcesUsed,
    providedKeys: new Set(Object.keys(merged)),
  })
}
