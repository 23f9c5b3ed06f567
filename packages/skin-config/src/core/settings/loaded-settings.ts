import type { RawSettings, RuntimeSettings } from "./schema"

export type SettingsKey = keyof RawSettings & string

/**
 * Validated runtime settings plus where each raw key came from.
 */
export class LoadedSettings {
  constructor(
    readonly value: Readonly<RuntimeSettings>,
    private readonly provenance: Readonly<Partial<Record<SettingsKey, string>>>,
    private readonly providedKeys: ReadonlySet<string>,
    private readonly knownKeys: ReadonlySet<string>,
  ) {
    Object.freeze(this.value)
  }

  /** Source name that supplied `key`, or "default" for schema defaults. */
  explain(key: SettingsKey): string {
    return this.provenance[key] ?? "default"
  }

  sourcesUsed(): string[] {
    return [...new Set(Object.values(this.provenance))]
  }

  /** Keys some source supplied that the schema does not know (typos, stale keys). */
  unknownKeys(): string[] {
    return [...this.providedKeys].filter((k) => !this.knownKeys.has(k))
  }
}
