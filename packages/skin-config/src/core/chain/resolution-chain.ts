import type {
  DrawableHandle,
  SampleHandle,
  SampleInfo,
  SkinAssets,
  SkinComponent,
  TextureHandle,
} from "../../ports/assets"
import type { Logger } from "../../ports/logger"
import type { Lookup } from "../../ports/lookup"
import type { Skin } from "../../ports/skin"
import { NullLogger } from "../../adapters/logger/null/null-logger"
import { assertCompatible, requireConverter } from "../lookup/compatibility"
import { lookupKeyId } from "../lookup/lookup-key-id"
import { ObservableValue } from "../observable/observable-value"
import type { SkinSource } from "../source/skin-source"
import { comboColourFallback, versionFallback } from "./fallback-policies"

export type ResolutionChainDeps = {
  logger?: Logger
}

/**
 * Ordered, immutable list of sources, most specific first.
 *
 * Membership changes build a new chain; a resolve call always walks a frozen list.
 */
export class ResolutionChain implements Skin {
  readonly sources: readonly SkinSource[]
  private readonly logger: Logger

  constructor(
    sources: readonly SkinSource[] = [],
    private readonly deps: ResolutionChainDeps = {},
  ) {
    this.sources = Object.freeze([...sources])
    this.logger = (deps.logger ?? new NullLogger()).child({ module: "resolution-chain" })
  }

  /** New chain with `source` as the most specific entry. */
  prepend(source: SkinSource): ResolutionChain {
    return new ResolutionChain([source, ...this.sources], this.deps)
  }

  /** New chain with `source` as the least specific entry. */
  append(source: SkinSource): ResolutionChain {
    return new ResolutionChain([...this.sources, source], this.deps)
  }

  without(source: SkinSource): ResolutionChain {
    return new ResolutionChain(
      this.sources.filter((s) => s !== source),
      this.deps,
    )
  }

  getConfig<T>(lookup: Lookup<T>): ObservableValue<T> | null {
    return this.resolve(lookup)
  }

  /**
   * First source with a usable value wins; later sources are never consulted.
   * Only when every source comes up empty does the category fallback run.
   *
   * @throws ContractViolationError on an impossible key/type pairing, even when the
   * chain is empty.
   */
  resolve<T>(lookup: Lookup<T>): ObservableValue<T> | null {
    assertCompatible(lookup)

    const id = lookupKeyId(lookup.key)

    for (const source of this.sources) {
      const local = source.tryGetLocal(lookup)

      switch (local.kind) {
        case "found":
          this.logger.debug("lookup resolved", { lookup: id, source: source.name })
          return new ObservableValue(local.value)

        case "not_convertible":
          this.logger.debug("skipping unconvertible value", {
            lookup: id,
            source: source.name,
            raw: local.failure.raw,
            target: local.failure.target,
            reason: local.failure.reason,
          })
          break

        case "none":
          break
      }
    }

    return this.fallback(lookup, id)
  }

  private fallback<T>(lookup: Lookup<T>, id: string): ObservableValue<T> | null {
    const { key } = lookup

    if (key.kind === "global-colour" && key.colour === "ComboColours") {
      const outcome = comboColourFallback(this.sources.map((s) => s.store))

      if (outcome.kind === "opted_out") {
        this.logger.debug("default combo colours disallowed", {
          lookup: id,
          source: this.sources[outcome.index]?.name,
        })
        return null
      }

      this.logger.debug("using default combo colours", { lookup: id })
      return new ObservableValue(requireConverter(lookup, "fromColourList")(outcome.colours))
    }

    if (key.kind === "legacy-setting" && key.setting === "Version") {
      const version = versionFallback()

      this.logger.debug("using latest version", { lookup: id, version })
      return new ObservableValue(requireConverter(lookup, "fromDecimal")(version))
    }

    this.logger.debug("lookup absent", { lookup: id })
    return null
  }

  getTexture(componentName: string): TextureHandle | undefined {
    return this.firstAsset((assets) => assets.getTexture(componentName))
  }

  getSample(sampleInfo: SampleInfo): SampleHandle | undefined {
    return this.firstAsset((assets) => assets.getSample(sampleInfo))
  }

  getDrawableComponent(component: SkinComponent): DrawableHandle | undefined {
    return this.firstAsset((assets) => assets.getDrawableComponent(component))
  }

  private firstAsset<A>(get: (assets: SkinAssets) => A | undefined): A | undefined {
    for (const source of this.sources) {
      const found = source.assets ? get(source.assets) : undefined
      if (found !== undefined) return found
    }
    return undefined
  }
}
