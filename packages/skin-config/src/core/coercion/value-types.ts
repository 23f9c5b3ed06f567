import type { Colour } from "../../ports/colour"
import type { ValueType } from "../../ports/value-type"
import {
  type EnumLike,
  parseBoolean,
  parseDecimal,
  parseEnumMember,
  parseInteger,
} from "./parsers"

const string: ValueType<string | null> = {
  name: "string",
  fromString: (raw) => ({ ok: true, value: raw }),
  fromNull: () => null,
}

const int: ValueType<number> = {
  name: "int",
  fromString: parseInteger,
}

const float: ValueType<number> = {
  name: "float",
  fromString: parseDecimal,
}

const bool: ValueType<boolean> = {
  name: "bool",
  fromString: parseBoolean,
}

const decimal: ValueType<number> = {
  name: "decimal",
  fromString: parseDecimal,
  fromDecimal: (value) => value,
}

const colour: ValueType<Colour> = {
  name: "colour",
  fromColour: (value) => value,
}

const colourList: ValueType<readonly Colour[]> = {
  name: "colour-list",
  fromColourList: (values) => values,
}

function enumOf<E extends EnumLike>(enumObject: E): ValueType<E[keyof E]> {
  return {
    name: "enum",
    fromString: (raw) => parseEnumMember(enumObject, raw),
  }
}

/**
 * Built-in value types.
 *
 * @example
 * ```typescript
 * enum Mode { Classic, Modern }
 *
 * requester.getConfig(lookups.setting("Cursor Size", ValueTypes.float))
 * requester.getConfig(lookups.setting("Mode", ValueTypes.enumOf(Mode)))
 * ```
 */
export const ValueTypes = {
  string,
  int,
  float,
  bool,
  decimal,
  colour,
  colourList,
  enumOf,
} as const
