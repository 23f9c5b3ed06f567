import type { Colour } from "../../ports/colour"
import type { Lookup } from "../../ports/lookup"
import type {
  GlobalColourName,
  LegacySettingName,
  LookupKey,
} from "../../ports/lookup-key"
import type { ValueType } from "../../ports/value-type"
import type { EnumLike } from "../coercion/parsers"
import { enumMemberNames } from "../coercion/parsers"
import { ValueTypes } from "../coercion/value-types"
import { ContractViolationError } from "../errors/errors"

/**
 * Pairs any key with any value type.
 *
 * Nothing is checked here; a pairing the key's slot cannot serve throws
 * `ContractViolationError` when resolved. Prefer the `lookups` builders.
 */
export function lookup<T>(key: LookupKey, type: ValueType<T>): Lookup<T> {
  return Object.freeze({ key, type })
}

function enumMember<E extends EnumLike, T>(
  enumObject: E,
  member: E[keyof E],
  type: ValueType<T>,
): Lookup<T> {
  const name = enumMemberNames(enumObject).find((n) => enumObject[n] === member)

  if (name === undefined) {
    throw new ContractViolationError(`${String(member)} is not a member of the given enum`, {
      context: { member: String(member) },
    })
  }

  return lookup({ kind: "enum", name }, type)
}

/**
 * Statically consistent lookup builders.
 *
 * @example
 * ```typescript
 * requester.getConfig(lookups.setting("Lookup", ValueTypes.string))
 * requester.getConfig(lookups.customColour("SliderBorder"))
 * requester.getConfig(lookups.comboColours())
 * ```
 */
export const lookups = {
  setting: <T>(name: string, type: ValueType<T>): Lookup<T> =>
    lookup({ kind: "setting", name }, type),

  enumMember,

  customColour: (name: string): Lookup<Colour> =>
    lookup({ kind: "custom-colour", name }, ValueTypes.colour),

  comboColours: (): Lookup<readonly Colour[]> =>
    lookup({ kind: "global-colour", colour: "ComboColours" }, ValueTypes.colourList),

  globalColour: (colour: Exclude<GlobalColourName, "ComboColours">): Lookup<Colour> =>
    lookup({ kind: "global-colour", colour }, ValueTypes.colour),

  legacyVersion: (): Lookup<number> =>
    lookup({ kind: "legacy-setting", setting: "Version" }, ValueTypes.decimal),

  legacySetting: <T>(
    setting: Exclude<LegacySettingName, "Version">,
    type: ValueType<T>,
  ): Lookup<T> => lookup({ kind: "legacy-setting", setting }, type),
} as const
