export const globalColourNames = [
  "ComboColours",
  "MenuGlow",
  "SongSelectActiveText",
  "SongSelectInactiveText",
] as const

export type GlobalColourName = (typeof globalColourNames)[number]

export const legacySettingNames = [
  "Version",
  "AnimationFramerate",
  "LayeredHitSounds",
  "AllowSliderBallTint",
  "SpinnerFrequencyModulate",
  "SpinnerNoBlink",
] as const

export type LegacySettingName = (typeof legacySettingNames)[number]

/** Free-text setting name, read from a store's `settings`. */
export type SettingKey = {
  readonly kind: "setting"
  readonly name: string
}

/**
 * Enum constant used as a key. The member name doubles as the `settings` key.
 */
export type EnumKey = {
  readonly kind: "enum"
  readonly name: string
}

export type CustomColourKey = {
  readonly kind: "custom-colour"
  readonly name: string
}

export type GlobalColourKey = {
  readonly kind: "global-colour"
  readonly colour: GlobalColourName
}

export type LegacySettingKey = {
  readonly kind: "legacy-setting"
  readonly setting: LegacySettingName
}

/**
 * Identifies what is being looked up.
 *
 * @remarks
 * Keys are plain values; use `lookupKeyId` when a key has to live in a Map or Set.
 */
export type LookupKey =
  | SettingKey
  | EnumKey
  | CustomColourKey
  | GlobalColourKey
  | LegacySettingKey

export type LookupKeyKind = LookupKey["kind"]
