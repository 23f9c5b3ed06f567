export type CoercionFailure = Readonly<{
  code: "not_convertible"
  /** Raw stored value; `null` for an explicit null entry. */
  raw: string | null
  /** Name of the requested value type. */
  target: string
  reason: string
  cause?: unknown
}>

export type Coerced<T> = {
  readonly kind: "coerced"
  readonly value: T
}

export type NotConvertible = {
  readonly kind: "not_convertible"
  readonly failure: CoercionFailure
}

export type CoercionResult<T> = Coerced<T> | NotConvertible
