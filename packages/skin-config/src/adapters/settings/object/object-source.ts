import type { SettingsSource } from "../../../ports/settings-source"

export class ObjectSource implements SettingsSource {
  readonly name: string

  constructor(
    private readonly values: Record<string, string | undefined>,
    label: string = "overrides",
  ) {
    this.name = `object:${label}`
  }

  async load(): Promise<Record<string, unknown>> {
    return { ...this.values }
  }
}
