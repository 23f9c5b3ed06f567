/** Version assumed when no source in the chain specifies one. */
export const LATEST_VERSION = 2.7

/** Version of a decoded store whose definition has no version field at all. */
export const LEGACY_BASELINE_VERSION = 1.0
