import type { SettingsSource } from "../../../ports/settings-source"
import { SETTINGS_PREFIX, unprefixed } from "../settings-prefix"

export type EnvSourceOptions = {
  /** @default "SKIN_" */
  prefix?: string

  /** @default process.env */
  env?: Readonly<Record<string, string | undefined>>
}

/**
 * Runtime settings from `SKIN_`-prefixed environment variables, so that
 * `SKIN_LOG_LEVEL=debug` sets `LOG_LEVEL`. The environment is read on every `load()`.
 */
export class EnvSource implements SettingsSource {
  readonly name = "env"

  constructor(private readonly options: EnvSourceOptions = {}) {}

  async load(): Promise<Record<string, unknown>> {
    return unprefixed(this.options.env ?? process.env, this.options.prefix ?? SETTINGS_PREFIX)
  }
}
