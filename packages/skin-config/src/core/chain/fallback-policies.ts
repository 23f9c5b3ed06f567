import type { Colour } from "../../ports/colour"
import { DEFAULT_COMBO_COLOURS } from "../colour/colour"
import type { ConfigurationStore } from "../store/configuration-store"
import { LATEST_VERSION } from "../store/legacy-version"

export type ComboColourFallback =
  | { readonly kind: "default"; readonly colours: readonly Colour[] }
  | { readonly kind: "opted_out"; readonly index: number }

/**
 * Second pass for combo colours, run only once no store in the chain had a palette.
 *
 * The default palette applies unless some store opts out; the first opt-out in chain
 * order is reported. A palette found in the first pass always wins over any opt-out,
 * including that of a more specific store.
 */
export function comboColourFallback(
  stores: readonly Pick<ConfigurationStore, "allowDefaultComboColoursFallback">[],
): ComboColourFallback {
  const index = stores.findIndex((store) => !store.allowDefaultComboColoursFallback)

  return index === -1
    ? { kind: "default", colours: DEFAULT_COMBO_COLOURS }
    : { kind: "opted_out", index }
}

/**
 * Version used once no store in the chain specifies one.
 */
export function versionFallback(): number {
  return LATEST_VERSION
}
