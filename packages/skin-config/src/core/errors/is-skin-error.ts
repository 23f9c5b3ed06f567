import type { AppError } from "../../ports/error"

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

/**
 * Structural guard for errors raised by this package, including copies that crossed
 * a module boundary and fail `instanceof`.
 *
 * @example
 * ```ts
 * try {
 *   requester.getConfig(lookup(key, type))
 * } catch (err) {
 *   if (isSkinError(err) && !err.isOperational) logger.error("bad lookup", { lookup: err.lookup })
 * }
 * ```
 */
export function isSkinError(e: unknown): e is AppError {
  if (!isRecord(e)) return false
  const { message, code, context, lookup, isOperational, timestamp } = e

  return (
    typeof message === "string" &&
    typeof code === "string" &&
    isRecord(context) &&
    (lookup === undefined || typeof lookup === "string") &&
    typeof isOperational === "boolean" &&
    timestamp instanceof Date
  )
}
