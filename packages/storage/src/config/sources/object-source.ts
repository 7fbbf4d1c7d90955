import type { SettingsSource } from "../settings-source"

export class ObjectSource implements SettingsSource {
  constructor(
    private readonly values: Record<string, unknown>,
    readonly name = "object:overrides",
  ) {}

  async load(): Promise<Record<string, unknown>> {
    return { ...this.values }
  }
}
