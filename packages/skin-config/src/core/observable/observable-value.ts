import { nanoid } from "nanoid"
import type { Observable, SubscribeOptions, ValueListener } from "../../ports/observable"

export class ObservableValue<T> implements Observable<T> {
  readonly id: string
  private current: T
  private readonly listeners = new Set<ValueListener<T>>()

  constructor(initial: T, id: string = nanoid()) {
    this.id = id
    this.current = initial
  }

  get value(): T {
    return this.current
  }

  set value(next: T) {
    const previous = this.current
    if (Object.is(previous, next)) return

    this.current = next

    for (const listener of [...this.listeners]) {
      listener(next, previous)
    }
  }

  subscribe(listener: ValueListener<T>, options: SubscribeOptions = {}): () => void {
    this.listeners.add(listener)

    if (options.immediate) listener(this.current, this.current)

    return () => {
      this.listeners.delete(listener)
    }
  }

  isSameAs(other: Observable<unknown>): boolean {
    return this.id === other.id
  }
}
