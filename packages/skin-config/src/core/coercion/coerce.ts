import type { CoercionResult } from "../../ports/coercion-result"
import type { ValueType } from "../../ports/value-type"
import { ContractViolationError } from "../errors/errors"

function notConvertible<T>(
  raw: string | null,
  type: ValueType<T>,
  reason: string,
  cause?: unknown,
): CoercionResult<T> {
  return {
    kind: "not_convertible",
    failure: {
      code: "not_convertible",
      raw,
      target: type.name,
      reason,
      ...(cause !== undefined && { cause }),
    },
  }
}

/**
 * Converts a raw `settings` value into `type`.
 *
 * Bad data never throws: it comes back as `not_convertible`. Only a type that cannot
 * be read from a string at all raises, since that is a caller bug.
 *
 * @throws ContractViolationError when `type` has no string converter.
 */
export function coerce<T>(raw: string | null, type: ValueType<T>): CoercionResult<T> {
  const { fromString, fromNull } = type

  if (!fromString) {
    throw new ContractViolationError(`Value type "${type.name}" cannot be read from a string`, {
      context: { valueType: type.name },
    })
  }

  if (raw === null) {
    return fromNull
      ? { kind: "coerced", value: fromNull() }
      : notConvertible(raw, type, `"${type.name}" does not accept null`)
  }

  try {
    const parsed = fromString(raw)

    return parsed.ok
      ? { kind: "coerced", value: parsed.value }
      : notConvertible(raw, type, parsed.reason)
  } catch (err) {
    return notConvertible(raw, type, "converter threw", err)
  }
}
