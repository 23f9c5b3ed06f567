import type { AppError, ErrorCode, ErrorContext, SerializedError } from "../../ports/error"

export type SkinErrorOptions<C extends ErrorCode = ErrorCode> = Readonly<{
  code: C
  lookup?: string
  context?: ErrorContext
  cause?: unknown
  /** @default true */
  isOperational?: boolean
}>

/**
 * Base of every error this package throws. Bad data inside a store never throws;
 * what does is either a caller bug (`isOperational: false`) or invalid input handed
 * to a decoder or the settings loader.
 */
export class SkinError<C extends ErrorCode = ErrorCode> extends Error implements AppError {
  readonly code: C
  readonly lookup: string | undefined
  readonly context: ErrorContext
  readonly isOperational: boolean
  readonly timestamp = new Date()

  constructor(message: string, options: SkinErrorOptions<C>) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause })

    this.name = new.target.name
    this.code = options.code
    this.lookup = options.lookup
    this.context = Object.freeze({ ...options.context })
    this.isOperational = options.isOperational ?? true
  }

  toJSON(): SerializedError {
    return serializeError(this)
  }
}

/**
 * Serialize any thrown value for a log line. Causes are followed recursively.
 *
 * Foreign errors get code "unknown" and count as non-operational; a thrown non-Error
 * becomes "NonErrorThrown".
 */
export function serializeError(err: unknown): SerializedError {
  if (!(err instanceof Error)) {
    return {
      name: "NonErrorThrown",
      code: "unknown",
      message: typeof err === "string" ? err : "Unknown error",
      context: { value: err },
      isOperational: false,
      timestamp: new Date().toISOString(),
    }
  }

  const own =
    err instanceof SkinError
      ? {
          code: err.code,
          ...(err.lookup !== undefined && { lookup: err.lookup }),
          context: { ...err.context },
          isOperational: err.isOperational,
          timestamp: err.timestamp.toISOString(),
        }
      : {
          code: "unknown",
          context: {},
          isOperational: false,
          timestamp: new Date().toISOString(),
        }

  return {
    name: err.name,
    message: err.message,
    ...own,
    ...(err.cause !== undefined && { cause: serializeError(err.cause) }),
  }
}
