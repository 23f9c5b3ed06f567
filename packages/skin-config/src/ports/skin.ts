import type { SkinAssets } from "./assets"
import type { Lookup } from "./lookup"
import type { Observable } from "./observable"

/**
 * Capability surface shared by the resolution chain and the requester facade.
 *
 * @example
 * ```typescript
 * const version = skin.getConfig(lookups.legacyVersion())
 * version?.value // 2.7
 * ```
 */
export interface Skin extends SkinAssets {
  /**
   * Resolves a lookup against the configured sources.
   *
   * @returns A fresh observable, or `null` when no source has a usable value and no
   * fallback applies.
   * @throws ContractViolationError when the key and value type cannot be paired.
   */
  getConfig<T>(lookup: Lookup<T>): Observable<T> | null
}
