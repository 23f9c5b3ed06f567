import type { Lookup } from "../../ports/lookup"
import type { LookupKey } from "../../ports/lookup-key"
import type { Converter, ValueType } from "../../ports/value-type"
import { ContractViolationError } from "../errors/errors"
import { lookupKeyId } from "./lookup-key-id"

/**
 * The converter a value type must provide to be read from the slot behind `key`.
 */
export function converterFor(key: LookupKey): Converter {
  switch (key.kind) {
    case "setting":
    case "enum":
      return "fromString"
    case "custom-colour":
      return "fromColour"
    case "global-colour":
      return key.colour === "ComboColours" ? "fromColourList" : "fromColour"
    case "legacy-setting":
      return key.setting === "Version" ? "fromDecimal" : "fromString"
  }
}

/**
 * Returns the converter `lookup.type` provides for `converter`.
 *
 * @throws ContractViolationError when the type does not provide it.
 */
export function requireConverter<T, K extends Converter>(
  lookup: Lookup<T>,
  converter: K,
): NonNullable<ValueType<T>[K]> {
  const fn = lookup.type[converter]

  if (fn === undefined || fn === null) {
    const id = lookupKeyId(lookup.key)

    throw new ContractViolationError(`Lookup "${id}" cannot produce a "${lookup.type.name}" value`, {
      lookup: id,
      context: { valueType: lookup.type.name, converter },
    })
  }

  return fn
}

/**
 * Fails fast on a structurally impossible pairing, before any source is consulted.
 */
export function assertCompatible<T>(lookup: Lookup<T>): void {
  requireConverter(lookup, converterFor(lookup.key))
}
