import { z } from "zod/mini"
import type { Colour } from "../../ports/colour"
import { colour } from "../colour/colour"
import { StoreDefinitionError } from "../errors/errors"
import { ConfigurationStore } from "./configuration-store"
import { LATEST_VERSION, LEGACY_BASELINE_VERSION } from "./legacy-version"
import {
  type ColourTuple,
  type StoreDefinition,
  storeDefinitionSchema,
} from "./store-definition.schema"

function toColour([r, g, b, a]: ColourTuple): Colour {
  return colour(r, g, b, a)
}

function toVersion(version: StoreDefinition["version"]): number | null {
  if (version === undefined) return LEGACY_BASELINE_VERSION
  if (version === "latest") return LATEST_VERSION
  return version
}

/**
 * Builds a store from a plain definition object (e.g. the output of a skin parser).
 *
 * - `version` missing -> `LEGACY_BASELINE_VERSION`
 * - `version: null` -> unspecified, defers down the chain
 * - `version: "latest"` -> `LATEST_VERSION`
 *
 * @throws StoreDefinitionError when the definition does not match the schema.
 */
export function decodeStore(definition: unknown): ConfigurationStore {
  const result = storeDefinitionSchema.safeParse(definition)

  if (!result.success) {
    throw new StoreDefinitionError(
      `Invalid store definition:\n${z.prettifyError(result.error)}`,
      result.error,
    )
  }

  const def = result.data

  return new ConfigurationStore({
    settings: Object.entries(def.settings ?? {}),
    customColours: Object.entries(def.customColours ?? {}).map(
      ([name, tuple]) => [name, toColour(tuple)] as const,
    ),
    comboColours: (def.comboColours ?? []).map(toColour),
    allowDefaultComboColoursFallback: def.allowDefaultComboColoursFallback ?? true,
    legacyVersion: toVersion(def.version),
  })
}
