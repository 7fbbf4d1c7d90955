import type { SettingsSource } from "../settings-source"

export type EnvSourceOptions = {
  env?: Record<string, string | undefined>
}

export class EnvSource implements SettingsSource {
  readonly name = "env"
  private readonly env: Record<string, string | undefined>

  constructor(options: EnvSourceOptions = {}) {
    this.env = options.env ?? process.env
  }

  async load(): Promise<Record<string, unknown>> {
    return { ...this.env }
  }
}
