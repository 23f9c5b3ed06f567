import type { ErrorContext } from "../../ports/error"
import { SkinError } from "./skin-error"

/**
 * A lookup paired a key with a value type its storage slot can never produce,
 * e.g. a custom colour requested as an integer. Always a caller bug.
 */
export class ContractViolationError extends SkinError<"contract_violation"> {
  constructor(message: string, options: { lookup?: string; context?: ErrorContext } = {}) {
    super(message, { code: "contract_violation", ...options, isOperational: false })
  }
}

export class StoreDefinitionError extends SkinError<"invalid_store_definition"> {
  constructor(message: string, cause?: unknown) {
    super(message, { code: "invalid_store_definition", cause })
  }
}

export class SettingsError extends SkinError<"invalid_settings"> {
  constructor(message: string, cause?: unknown) {
    super(message, { code: "invalid_settings", cause })
  }
}

export class ColourRangeError extends SkinError<"colour_out_of_range"> {
  constructor(channel: string, value: number) {
    super(`Colour channel "${channel}" must be an integer in 0-255, got ${value}`, {
      code: "colour_out_of_range",
      context: { channel, value },
    })
  }
}
