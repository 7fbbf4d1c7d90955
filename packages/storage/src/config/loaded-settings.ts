/**
 * Validated settings together with where each value came from.
 */
export type SettingsTrace = {
  /** Source name per known key, last writer wins */
  provenance: Readonly<Record<string, string>>
  /** Sources that supplied at least one defined value, in load order */
  sourcesUsed: readonly string[]
  providedKeys: ReadonlySet<string>
}

export class LoadedSettings<T extends Record<string, unknown>> {
  constructor(
    private readonly data: Readonly<T>,
    private readonly trace: SettingsTrace,
  ) {
    Object.freeze(this.data)
  }

  get value(): Readonly<T> {
    return this.data
  }

  /** Source that supplied `key`, or "default" when the schema filled it in. */
  explain<K extends keyof T & string>(key: K): string {
    return this.trace.provenance[key] ?? "default"
  }

  /**
   * Distinct source names, in the order first seen. A source counts even when
   * later ones overrode every key it supplied.
   */
  sourcesUsed(): string[] {
    return [...this.trace.sourcesUsed]
  }

  /**
   * Provided keys the schema does not know, limited to those starting with
   * `prefix` (the environment carries plenty of unrelated variables).
   */
  unknownKeys(prefix = ""): string[] {
    const known = new Set(Object.keys(this.data))

    return [...this.trace.providedKeys].filter((key) => key.startsWith(prefix) && !known.has(key))
  }
}
