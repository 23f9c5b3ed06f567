import { loadSettings } from "../../core/settings/load-settings"
import type { SettingsSource } from "../settings-source"

export type SettingsSourceHarness = {
  name: string

  /**
   * A source that yields exactly `settings`, stored the way the source expects them
   * (e.g. `SKIN_`-prefixed), next to entries it must ignore.
   */
  make: (settings: Record<string, string>) => Promise<{
    source: SettingsSource
    cleanup?: () => Promise<void>
  }>
}

const SEEDED = { LOG_LEVEL: "debug", SERVICE_NAME: "skin-tests" }

export function describeSettingsSourceContract(h: SettingsSourceHarness) {
  describe(`${h.name} (SettingsSource contract)`, () => {
    let source: SettingsSource
    let cleanup: (() => Promise<void>) | undefined

    beforeEach(async () => {
      const result = await h.make(SEEDED)

      source = result.source
      cleanup = result.cleanup
    })

    afterEach(async () => {
      await cleanup?.()
    })

    it("has a name", () => {
      expect(source.name).not.toBe("")
    })

    it("load() yields the settings keys and nothing else", async () => {
      expect(await source.load()).toEqual(SEEDED)
    })

    it("load() is idempotent and hands out copies", async () => {
      const first = await source.load()
      first.LOG_LEVEL = "fatal"

      expect(await source.load()).toEqual(SEEDED)
    })

    it("feeds loadSettings with provenance", async () => {
      const settings = await loadSettings({ sources: [source] })

      expect(settings.value.logging.level).toBe("debug")
      expect(settings.value.logging.serviceName).toBe("skin-tests")
      expect(settings.explain("LOG_LEVEL")).toBe(source.name)
      expect(settings.explain("ENV")).toBe("default")
    })
  })
}
