import { SETTINGS_PREFIX, unprefixed } from "../settings-prefix"

describe("unprefixed", () => {
  it("keeps prefixed entries without the prefix", () => {
    expect(
      unprefixed({ SKIN_LOG_LEVEL: "debug", LOG_LEVEL: "error", PATH: "/usr/bin" }, SETTINGS_PREFIX),
    ).toEqual({ LOG_LEVEL: "debug" })
  })

  it("drops unset values", () => {
    expect(unprefixed({ SKIN_ENV: undefined, SKIN_LOG_PRETTY: "" }, "SKIN_")).toEqual({
      LOG_PRETTY: "",
    })
  })
})
