import type { LookupKey } from "./lookup-key"
import type { ValueType } from "./value-type"

/**
 * A lookup request: what to find, and what type to hand back.
 */
export type Lookup<T> = Readonly<{
  key: LookupKey
  type: ValueType<T>
}>
