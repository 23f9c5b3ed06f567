import type { Colour } from "../../ports/colour"

export type ConfigurationStoreInit = {
  settings?: Iterable<readonly [string, string | null]>
  customColours?: Iterable<readonly [string, Colour]>
  comboColours?: readonly Colour[]
  allowDefaultComboColoursFallback?: boolean
  legacyVersion?: number | null
}

/**
 * Storage behind a single source.
 *
 * Only the owner of the source mutates a store. Each entry is replaced as a whole,
 * so a resolve call sees either the old or the new value of an entry.
 */
export class ConfigurationStore {
  /** `null` values are explicit "no value" entries, distinct from a missing key. */
  readonly settings: Map<string, string | null>
  readonly customColours: Map<string, Colour>

  /** When `false`, an empty palette across the whole chain stays empty. */
  allowDefaultComboColoursFallback: boolean

  /** `null` defers to the next source, then to the latest version. */
  legacyVersion: number | null

  private combo: readonly Colour[]

  constructor(init: ConfigurationStoreInit = {}) {
    this.settings = new Map(init.settings)
    this.customColours = new Map(init.customColours)
    this.combo = Object.freeze([...(init.comboColours ?? [])])
    this.allowDefaultComboColoursFallback = init.allowDefaultComboColoursFallback ?? true
    this.legacyVersion = init.legacyVersion ?? null
  }

  get comboColours(): readonly Colour[] {
    return this.combo
  }

  addComboColours(...colours: Colour[]): void {
    this.combo = Object.freeze([...this.combo, ...colours])
  }

  clearComboColours(): void {
    this.combo = Object.freeze([])
  }
}
