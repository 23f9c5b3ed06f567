import type { NotConvertible } from "./coercion-result"

export type LocalFound<T> = {
  readonly kind: "found"
  readonly value: T
}

export type LocalNone = {
  readonly kind: "none"
}

/**
 * What a single source knows about a lookup.
 *
 * @remarks
 * `none` means the source does not define the key at all. `not_convertible` means it
 * does, but the stored value cannot become the requested type; the chain treats both
 * as "nothing usable here" and moves on.
 */
export type LocalLookup<T> = LocalFound<T> | LocalNone | NotConvertible
