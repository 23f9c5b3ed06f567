/**
 * An RGBA colour with 8-bit channels (0-255).
 */
export type Colour = Readonly<{
  r: number
  g: number
  b: number
  a: number
}>
