import { colour } from "../../colour/colour"
import { ConfigurationStore } from "../configuration-store"

describe("ConfigurationStore", () => {
  it("starts empty with fallback allowed and no version", () => {
    const store = new ConfigurationStore()

    expect(store.settings.size).toBe(0)
    expect(store.customColours.size).toBe(0)
    expect(store.comboColours).toEqual([])
    expect(store.allowDefaultComboColoursFallback).toBe(true)
    expect(store.legacyVersion).toBeNull()
  })

  it("keeps explicit null settings distinct from missing keys", () => {
    const store = new ConfigurationStore({ settings: [["Lookup", null]] })

    expect(store.settings.has("Lookup")).toBe(true)
    expect(store.settings.get("Lookup")).toBeNull()
    expect(store.settings.has("Other")).toBe(false)
  })

  it("appends combo colours in order", () => {
    const store = new ConfigurationStore({ comboColours: [colour(1, 1, 1)] })

    store.addComboColours(colour(2, 2, 2), colour(3, 3, 3))

    expect(store.comboColours).toEqual([colour(1, 1, 1), colour(2, 2, 2), colour(3, 3, 3)])
  })

  it("replaces the palette instead of mutating a handed-out one", () => {
    const store = new ConfigurationStore()
    store.addComboColours(colour(1, 1, 1))

    const before = store.comboColours
    store.addComboColours(colour(2, 2, 2))

    expect(before).toEqual([colour(1, 1, 1)])
    expect(Object.isFrozen(store.comboColours)).toBe(true)
  })

  it("clears the palette", () => {
    const store = new ConfigurationStore({ comboColours: [colour(1, 1, 1)] })

    store.clearComboColours()

    expect(store.comboColours).toEqual([])
  })

  it("does not share the initial palette array", () => {
    const initial = [colour(1, 1, 1)]
    const store = new ConfigurationStore({ comboColours: initial })

    initial.push(colour(2, 2, 2))

    expect(store.comboColours).toHaveLength(1)
  })
})
