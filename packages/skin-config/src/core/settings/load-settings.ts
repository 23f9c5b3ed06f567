import { z } from "zod/mini"
import { EnvSource } from "../../adapters/settings/env/env-source"
import type { SettingsSource } from "../../ports/settings-source"
import { SettingsError } from "../errors/errors"
import { LoadedSettings, type SettingsKey } from "./loaded-settings"
import { mapRawSettings, settingsSchema } from "./schema"

export type LoadSettingsOptions = {
  /**
   * Applied in order; later sources override earlier ones.
   * @default [new EnvSource()]
   */
  sources?: SettingsSource[]
}

const knownKeys: ReadonlySet<string> = new Set(Object.keys(settingsSchema.shape))

function isSettingsKey(key: string): key is SettingsKey {
  return knownKeys.has(key)
}

/**
 * @throws SettingsError when the merged values fail validation.
 */
export async function loadSettings({
  sources,
}: LoadSettingsOptions = {}): Promise<LoadedSettings> {
  const merged: Record<string, unknown> = {}
  const provenance: Partial<Record<SettingsKey, string>> = {}

  for (const source of sources ?? [new EnvSource()]) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value === undefined) continue

      merged[key] = value
      if (isSettingsKey(key)) provenance[key] = source.name
    }
  }

  const result = settingsSchema.safeParse(merged)

  if (!result.success) {
    throw new SettingsError(
      `Settings validation failed:\n${z.prettifyError(result.error)}`,
      result.error,
    )
  }

  return new LoadedSettings(
    mapRawSettings(result.data),
    provenance,
    new Set(Object.keys(merged)),
    knownKeys,
  )
}
