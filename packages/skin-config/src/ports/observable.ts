export type ValueListener<T> = (value: T, previous: T) => void

export type SubscribeOptions = {
  /** Invoke the listener once with the current value right away. */
  immediate?: boolean
}

/**
 * A single-value container handed back by a lookup.
 */
export interface Observable<T> {
  /** Identity of this container; two lookups never share one. */
  readonly id: string

  value: T

  subscribe(listener: ValueListener<T>, options?: SubscribeOptions): () => void

  isSameAs(other: Observable<unknown>): boolean
}
