/**
 * A source of runtime settings (log level, service name, ...).
 *
 * Only *loads* raw values; validation and coercion happen in `loadSettings`.
 * Sources are applied in order and later sources override earlier ones.
 */
export interface SettingsSource {
  /**
   * Human-readable name for provenance.
   * Example: "env", "dotenv:.env.local", "object:overrides"
   */
  readonly name: string

  /**
   * Load raw values. Returning `undefined` for a key means "not provided".
   */
  load(): Promise<Record<string, unknown>>
}
