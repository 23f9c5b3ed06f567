import { NullLogger } from "../../adapters/logger/null/null-logger"
import type { Logger } from "../../ports/logger"
import { ResolutionChain } from "../chain/resolution-chain"
import { SkinRequester } from "../requester/skin-requester"
import type { SkinSource } from "../source/skin-source"

export type ProviderScopeDeps = {
  logger?: Logger
}

/**
 * Immutable nesting of sources, e.g. user skin > beatmap skin > requester.
 *
 * Each `provide()` returns a new, more specific scope whose chain lists its own source
 * first and then every enclosing one. Existing scopes and chains are never touched.
 *
 * @example
 * ```typescript
 * const scope = ProviderScope.root()
 *   .provide(new SkinSource({ name: "user", store: userStore }))
 *   .provide(new SkinSource({ name: "beatmap", store: beatmapStore }))
 *
 * scope.chain.sources.map((s) => s.name) // ["beatmap", "user"]
 * ```
 */
export class ProviderScope {
  readonly chain: ResolutionChain

  private constructor(
    readonly name: string,
    readonly parent: ProviderScope | undefined,
    private readonly logger: Logger,
    sources: readonly SkinSource[],
  ) {
    this.chain = new ResolutionChain(sources, { logger: logger.child({ scope: name }) })
  }

  static root(deps: ProviderScopeDeps = {}): ProviderScope {
    return new ProviderScope("root", undefined, deps.logger ?? new NullLogger(), [])
  }

  provide(source: SkinSource): ProviderScope {
    return new ProviderScope(source.name, this, this.logger, [
      source,
      ...this.chain.sources,
    ])
  }

  requester(): SkinRequester {
    return new SkinRequester(this.chain)
  }
}
