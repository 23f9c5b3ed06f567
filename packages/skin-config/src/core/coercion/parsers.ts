import type { Parsed } from "../../ports/value-type"

const INTEGER = /^[+-]?\d+$/
const DECIMAL = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/

const ok = <T>(value: T): Parsed<T> => ({ ok: true, value })
const fail = <T>(reason: string): Parsed<T> => ({ ok: false, reason })

// Number() also takes "", "0x1F" and "Infinity"; the patterns keep parsing decimal-only.

export function parseInteger(raw: string): Parsed<number> {
  const text = raw.trim()
  if (!INTEGER.test(text)) return fail(`"${raw}" is not an integer`)

  const value = Number(text)
  if (!Number.isSafeInteger(value)) return fail(`"${raw}" is outside the safe integer range`)

  return ok(value)
}

export function parseDecimal(raw: string): Parsed<number> {
  const text = raw.trim()
  if (!DECIMAL.test(text)) return fail(`"${raw}" is not a decimal number`)

  const value = Number(text)
  if (!Number.isFinite(value)) return fail(`"${raw}" is not finite`)

  return ok(value)
}

export function parseBoolean(raw: string): Parsed<boolean> {
  switch (raw.trim().toLowerCase()) {
    case "1":
    case "true":
      return ok(true)
    case "0":
    case "false":
      return ok(false)
    default:
      return fail(`"${raw}" is not a boolean token`)
  }
}

export type EnumLike = Record<string, string | number>

/**
 * Member names of a TypeScript enum object, without the reverse mappings numeric
 * enums add (`{ 0: "First" }`). A reverse entry points at a member whose value is
 * its own key.
 */
export function enumMemberNames<E extends EnumLike>(enumObject: E): Array<keyof E & string> {
  return (Object.keys(enumObject) as Array<keyof E & string>).filter((name) => {
    const value = enumObject[name]
    return !(typeof value === "string" && enumObject[value] === Number(name))
  })
}

/** Exact, case-sensitive member name match. */
export function parseEnumMember<E extends EnumLike>(
  enumObject: E,
  raw: string,
): Parsed<E[keyof E]> {
  for (const name of enumMemberNames(enumObject)) {
    if (name === raw) return ok(enumObject[name])
  }
  return fail(`"${raw}" is not a member name`)
}
