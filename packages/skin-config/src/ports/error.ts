export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to errors (type names, converter, channel, ...).
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode
  readonly context: ErrorContext

  /** `lookupKeyId` of the lookup being resolved, when the error came from one. */
  readonly lookup: string | undefined

  /**
   * `true` for bad input data (a store definition, settings), `false` for caller
   * bugs such as an impossible lookup pairing.
   */
  readonly isOperational: boolean

  readonly timestamp: Date
  readonly cause?: unknown
}

/**
 * JSON-safe error shape for logs.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  lookup?: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
}>
