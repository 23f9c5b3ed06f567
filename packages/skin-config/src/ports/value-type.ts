import type { Colour } from "./colour"

export type Parsed<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly reason: string }

/**
 * Describes the value a lookup expects, and which storage slots it can be read from.
 *
 * A converter that is missing means the slot is structurally incompatible with
 * this type. Asking for it is a caller bug and surfaces as a contract violation.
 *
 * @typeParam T - The resolved value type.
 */
export interface ValueType<T> {
  /** Name used in failures and logs (e.g. "float", "enum"). */
  readonly name: string

  /** Parses a raw string stored in `settings`. */
  readonly fromString?: (raw: string) => Parsed<T>

  /**
   * Value for an explicit `null` entry.
   * Only nullable types provide this; others fail with `not_convertible`.
   */
  readonly fromNull?: () => T

  readonly fromColour?: (colour: Colour) => T

  readonly fromColourList?: (colours: readonly Colour[]) => T

  readonly fromDecimal?: (value: number) => T
}

export type Converter = "fromString" | "fromColour" | "fromColourList" | "fromDecimal"
