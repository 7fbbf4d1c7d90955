/**
 * Raw settings from one place (environment, dotenv file, overrides).
 * Sources only load; validation and coercion happen in the schema.
 * Later sources override earlier ones.
 */
export interface SettingsSource {
  /** Shown by `explain()`, e.g. "env" or "dotenv:.env.production" */
  readonly name: string

  /** An undefined value means "not provided". */
  load(): Promise<Record<string, unknown>>
}
