/** Namespace for runtime settings in the environment and in .env files. */
export const SETTINGS_PREFIX = "SKIN_"

/**
 * Entries under `prefix`, keyed without it. Unset values are dropped.
 *
 * @example
 * ```typescript
 * unprefixed({ SKIN_LOG_LEVEL: "debug", PATH: "/usr/bin" }, "SKIN_") // { LOG_LEVEL: "debug" }
 * ```
 */
export function unprefixed(
  entries: Readonly<Record<string, string | undefined>>,
  prefix: string,
): Record<string, string> {
  const values: Record<string, string> = {}

  for (const [key, value] of Object.entries(entries)) {
    if (value !== undefined && key.startsWith(prefix)) values[key.slice(prefix.length)] = value
  }

  return values
}
