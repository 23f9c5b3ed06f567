import type { LookupKey } from "../../ports/lookup-key"

/**
 * Stable string identity for a key, suitable for Map/Set membership and logs.
 *
 * @example
 * ```ts
 * lookupKeyId({ kind: "setting", name: "Lookup" }) // "setting:Lookup"
 * ```
 */
export function lookupKeyId(key: LookupKey): string {
  switch (key.kind) {
    case "setting":
    case "enum":
    case "custom-colour":
      return `${key.kind}:${key.name}`
    case "global-colour":
      return `${key.kind}:${key.colour}`
    case "legacy-setting":
      return `${key.kind}:${key.setting}`
  }
}

export function lookupKeysEqual(a: LookupKey, b: LookupKey): boolean {
  return lookupKeyId(a) === lookupKeyId(b)
}
