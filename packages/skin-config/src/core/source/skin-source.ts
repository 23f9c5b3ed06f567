import type { SkinAssets } from "../../ports/assets"
import type { LocalLookup } from "../../ports/local-lookup"
import type { Lookup } from "../../ports/lookup"
import { coerce } from "../coercion/coerce"
import { requireConverter } from "../lookup/compatibility"
import { ConfigurationStore } from "../store/configuration-store"

export type SkinSourceOptions = {
  /**
   * Name used for provenance and logs.
   * Example: "user", "beatmap:1234"
   */
  name: string

  /** @default an empty `ConfigurationStore` */
  store?: ConfigurationStore

  assets?: SkinAssets
}

const NONE = Object.freeze({ kind: "none" as const })

/**
 * One configuration layer. Answers only for its own store; it never looks further
 * down the chain.
 */
export class SkinSource {
  readonly name: string
  readonly store: ConfigurationStore
  readonly assets: SkinAssets | undefined

  constructor(options: SkinSourceOptions) {
    this.name = options.name
    this.store = options.store ?? new ConfigurationStore()
    this.assets = options.assets
  }

  /**
   * @throws ContractViolationError when the lookup's slot cannot produce its value type.
   */
  tryGetLocal<T>(lookup: Lookup<T>): LocalLookup<T> {
    const { key } = lookup

    switch (key.kind) {
      case "setting":
      case "enum":
        return this.fromSettings(lookup, key.name)

      case "custom-colour":
        return this.fromCustomColours(lookup, key.name)

      case "global-colour": {
        if (key.colour !== "ComboColours") return this.fromCustomColours(lookup, key.colour)

        const fromColourList = requireConverter(lookup, "fromColourList")
        const colours = this.store.comboColours

        // An empty palette is "not defined here"; the chain decides on defaults.
        return colours.length > 0 ? { kind: "found", value: fromColourList(colours) } : NONE
      }

      case "legacy-setting": {
        if (key.setting !== "Version") return this.fromSettings(lookup, key.setting)

        const fromDecimal = requireConverter(lookup, "fromDecimal")
        const version = this.store.legacyVersion

        return version === null ? NONE : { kind: "found", value: fromDecimal(version) }
      }
    }
  }

  private fromSettings<T>(lookup: Lookup<T>, name: string): LocalLookup<T> {
    requireConverter(lookup, "fromString")

    if (!this.store.settings.has(name)) return NONE

    const raw = this.store.settings.get(name) ?? null
    const result = coerce(raw, lookup.type)

    return result.kind === "coerced" ? { kind: "found", value: result.value } : result
  }

  private fromCustomColours<T>(lookup: Lookup<T>, name: string): LocalLookup<T> {
    const fromColour = requireConverter(lookup, "fromColour")
    const stored = this.store.customColours.get(name)

    return stored === undefined ? NONE : { kind: "found", value: fromColour(stored) }
  }
}
