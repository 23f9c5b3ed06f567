import type { Colour } from "../../ports/colour"
import { ColourRangeError } from "../errors/errors"

function channel(name: string, value: number): number {
  if (!Number.isInteger(value) || value < 0 || value > 255) {
    throw new ColourRangeError(name, value)
  }
  return value
}

/**
 * Builds a frozen colour, validating every channel.
 *
 * @throws ColourRangeError when a channel is not an integer in 0-255.
 */
export function colour(r: number, g: number, b: number, a: number = 255): Colour {
  return Object.freeze({
    r: channel("r", r),
    g: channel("g", g),
    b: channel("b", b),
    a: channel("a", a),
  })
}

export function colourEquals(x: Colour, y: Colour): boolean {
  return x.r === y.r && x.g === y.g && x.b === y.b && x.a === y.a
}

export function colourListEquals(x: readonly Colour[], y: readonly Colour[]): boolean {
  return x.length === y.length && x.every((c, i) => {
    const other = y[i]
    return other !== undefined && colourEquals(c, other)
  })
}

/** Palette used for combo colours when no source defines one and none opts out. */
export const DEFAULT_COMBO_COLOURS: readonly Colour[] = Object.freeze([
  colour(255, 192, 0),
  colour(0, 202, 0),
  colour(18, 124, 255),
  colour(242, 24, 57),
])
