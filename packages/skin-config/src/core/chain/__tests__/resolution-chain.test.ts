import { PinoLogger } from "../../../adapters/logger/pino/pino-logger"
import { MemorySkinAssets } from "../../../adapters/assets/memory/memory-skin-assets"
import { captureDestination } from "../../../tests/utils/capture-destination"
import { colour, DEFAULT_COMBO_COLOURS } from "../../colour/colour"
import { ValueTypes } from "../../coercion/value-types"
import { ContractViolationError } from "../../errors/errors"
import { lookup, lookups } from "../../lookup/lookups"
import { SkinSource } from "../../source/skin-source"
import { ConfigurationStore, type ConfigurationStoreInit } from "../../store/configuration-store"
import { ResolutionChain } from "../resolution-chain"

function source(name: string, init: ConfigurationStoreInit = {}) {
  return new SkinSource({ name, store: new ConfigurationStore(init) })
}

describe("ResolutionChain", () => {
  describe("first pass", () => {
    it("returns the value of the first source that defines the key", () => {
      const chain = new ResolutionChain([
        source("inner", { settings: [["Lookup", "inner value"]] }),
        source("outer", { settings: [["Lookup", "outer value"]] }),
      ])

      expect(chain.getConfig(lookups.setting("Lookup", ValueTypes.string))?.value).toBe(
        "inner value",
      )
    })

    it("falls through sources that do not define the key", () => {
      const chain = new ResolutionChain([
        source("inner"),
        source("outer", { settings: [["Lookup", "outer value"]] }),
      ])

      expect(chain.getConfig(lookups.setting("Lookup", ValueTypes.string))?.value).toBe(
        "outer value",
      )
    })

    it("skips a value that cannot be converted and keeps looking", () => {
      const chain = new ResolutionChain([
        source("inner", { settings: [["Size", "huge"]] }),
        source("outer", { settings: [["Size", "3"]] }),
      ])

      expect(chain.getConfig(lookups.setting("Size", ValueTypes.int))?.value).toBe(3)
    })

    it("returns null when nothing converts", () => {
      const chain = new ResolutionChain([source("inner", { settings: [["Size", "huge"]] })])

      expect(chain.getConfig(lookups.setting("Size", ValueTypes.int))).toBeNull()
    })

    it("stops at an explicit null for types that accept it", () => {
      const chain = new ResolutionChain([
        source("inner", { settings: [["Lookup", null]] }),
        source("outer", { settings: [["Lookup", "outer value"]] }),
      ])

      const result = chain.getConfig(lookups.setting("Lookup", ValueTypes.string))

      expect(result).not.toBeNull()
      expect(result?.value).toBeNull()
    })

    it("skips an explicit null for types that do not accept it", () => {
      const chain = new ResolutionChain([
        source("inner", { settings: [["Size", null]] }),
        source("outer", { settings: [["Size", "4"]] }),
      ])

      expect(chain.getConfig(lookups.setting("Size", ValueTypes.int))?.value).toBe(4)
    })

    it("hands out a fresh observable per lookup", () => {
      const chain = new ResolutionChain([source("inner", { settings: [["Lookup", "x"]] })])
      const query = lookups.setting("Lookup", ValueTypes.string)

      const first = chain.getConfig(query)
      const second = chain.getConfig(query)

      expect(first).not.toBeNull()
      expect(second).not.toBeNull()
      if (first && second) expect(first.isSameAs(second)).toBe(false)
    })
  })

  describe("fallback", () => {
    it("returns the default palette when no store has one", () => {
      const chain = new ResolutionChain([source("inner"), source("outer")])

      expect(chain.getConfig(lookups.comboColours())?.value).toEqual(DEFAULT_COMBO_COLOURS)
    })

    it("returns null for combo colours when a store opts out", () => {
      const chain = new ResolutionChain([
        source("inner"),
        source("outer", { allowDefaultComboColoursFallback: false }),
      ])

      expect(chain.getConfig(lookups.comboColours())).toBeNull()
    })

    it("prefers a real palette over another store's opt-out", () => {
      const palette = [colour(10, 20, 30)]
      const chain = new ResolutionChain([
        source("inner", { allowDefaultComboColoursFallback: false }),
        source("outer", { comboColours: palette }),
      ])

      expect(chain.getConfig(lookups.comboColours())?.value).toEqual(palette)
    })

    it("returns the latest version when no store sets one", () => {
      const chain = new ResolutionChain([source("inner"), source("outer")])

      expect(chain.getConfig(lookups.legacyVersion())?.value).toBe(2.7)
    })

    it("returns the default palette and latest version for an empty chain", () => {
      const chain = new ResolutionChain()

      expect(chain.getConfig(lookups.comboColours())?.value).toEqual(DEFAULT_COMBO_COLOURS)
      expect(chain.getConfig(lookups.legacyVersion())?.value).toBe(2.7)
      expect(chain.getConfig(lookups.customColour("Lookup"))).toBeNull()
    })
  })

  describe("contract violations", () => {
    it("throws for an impossible pairing even on an empty chain", () => {
      const chain = new ResolutionChain()

      expect(() =>
        chain.getConfig(lookup({ kind: "custom-colour", name: "Lookup" }, ValueTypes.int)),
      ).toThrow(ContractViolationError)
    })

    it("throws instead of falling through when a source stores the key", () => {
      const chain = new ResolutionChain([
        source("inner", { customColours: [["Lookup", colour(255, 0, 0)]] }),
      ])

      expect(() =>
        chain.getConfig(lookup({ kind: "custom-colour", name: "Lookup" }, ValueTypes.string)),
      ).toThrow(ContractViolationError)
    })
  })

  describe("membership", () => {
    it("builds new chains without touching the original", () => {
      const a = source("a")
      const b = source("b")
      const c = source("c")
      const chain = new ResolutionChain([b])

      const prepended = chain.prepend(a)
      const appended = prepended.append(c)
      const removed = appended.without(b)

      expect(chain.sources).toEqual([b])
      expect(prepended.sources).toEqual([a, b])
      expect(appended.sources).toEqual([a, b, c])
      expect(removed.sources).toEqual([a, c])
      expect(Object.isFrozen(chain.sources)).toBe(true)
    })

    it("sees a store mutation on the next lookup", () => {
      const inner = source("inner")
      const chain = new ResolutionChain([inner])
      const query = lookups.setting("Lookup", ValueTypes.string)

      expect(chain.getConfig(query)).toBeNull()

      inner.store.settings.set("Lookup", "late value")

      expect(chain.getConfig(query)?.value).toBe("late value")
    })
  })

  describe("assets", () => {
    it("returns the first source's asset", () => {
      const inner = new SkinSource({
        name: "inner",
        assets: new MemorySkinAssets({ textures: [{ name: "cursor", width: 32, height: 32 }] }),
      })
      const outer = new SkinSource({
        name: "outer",
        assets: new MemorySkinAssets({
          textures: [
            { name: "cursor", width: 64, height: 64 },
            { name: "hitcircle", width: 128, height: 128 },
          ],
        }),
      })
      const chain = new ResolutionChain([inner, source("empty"), outer])

      expect(chain.getTexture("cursor")).toEqual({ name: "cursor", width: 32, height: 32 })
      expect(chain.getTexture("hitcircle")).toEqual({
        name: "hitcircle",
        width: 128,
        height: 128,
      })
      expect(chain.getTexture("missing")).toBeUndefined()
    })
  })

  describe("logging", () => {
    function chainWithCapture(sources: SkinSource[]) {
      const capture = captureDestination()
      const logger = new PinoLogger({ destination: capture.destination }, { level: "debug" })

      return { chain: new ResolutionChain(sources, { logger }), read: capture.read }
    }

    it("logs which source answered", () => {
      const { chain, read } = chainWithCapture([
        source("beatmap", { settings: [["Lookup", "x"]] }),
      ])

      chain.getConfig(lookups.setting("Lookup", ValueTypes.string))

      expect(read().map((l) => l.payload)).toEqual([
        expect.objectContaining({
          msg: "lookup resolved",
          module: "resolution-chain",
          lookup: "setting:Lookup",
          source: "beatmap",
        }),
      ])
    })

    it("logs skipped values with the failure reason", () => {
      const { chain, read } = chainWithCapture([
        source("beatmap", { settings: [["Size", "huge"]] }),
      ])

      chain.getConfig(lookups.setting("Size", ValueTypes.int))

      expect(read().map((l) => l.payload)).toEqual([
        expect.objectContaining({
          msg: "skipping unconvertible value",
          source: "beatmap",
          raw: "huge",
          target: "int",
          reason: '"huge" is not an integer',
        }),
        expect.objectContaining({ msg: "lookup absent", lookup: "setting:Size" }),
      ])
    })

    it("names the store that disallowed default combo colours", () => {
      const { chain, read } = chainWithCapture([
        source("beatmap", { allowDefaultComboColoursFallback: false }),
      ])

      chain.getConfig(lookups.comboColours())

      expect(read()[0]?.payload).toMatchObject({
        msg: "default combo colours disallowed",
        source: "beatmap",
      })
    })
  })
})
