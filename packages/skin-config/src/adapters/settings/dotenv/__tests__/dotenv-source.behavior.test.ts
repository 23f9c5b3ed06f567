import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { DotenvSource } from "../dotenv-source"

describe("DotenvSource behavior", () => {
  let cwd: string

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "dotenv-test-"))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true })
  })

  it("parses prefixed key=value pairs", async () => {
    await fs.writeFile(
      path.join(cwd, ".env"),
      "SKIN_LOG_LEVEL=debug\nSKIN_ENV=test\nOTHER=ignored",
    )

    const source = new DotenvSource({ file: ".env", required: true, cwd })

    expect(await source.load()).toEqual({
      LOG_LEVEL: "debug",
      ENV: "test",
    })
  })

  it("handles quoted values and comments", async () => {
    await fs.writeFile(
      path.join(cwd, ".env"),
      `# local overrides\nSKIN_SERVICE_NAME="skin tests"\nSKIN_ENV='local'`,
    )

    const source = new DotenvSource({ file: ".env", required: true, cwd })

    expect(await source.load()).toEqual({
      SERVICE_NAME: "skin tests",
      ENV: "local",
    })
  })

  it("uses a custom prefix", async () => {
    await fs.writeFile(path.join(cwd, ".env.local"), "APP_LOG_LEVEL=warn\nSKIN_LOG_LEVEL=info")

    const source = new DotenvSource({ file: ".env.local", required: true, cwd, prefix: "APP_" })

    expect(await source.load()).toEqual({ LOG_LEVEL: "warn" })
  })

  it("returns empty object when file missing and not required", async () => {
    const source = new DotenvSource({ file: ".env", required: false, cwd })

    expect(await source.load()).toEqual({})
  })

  it("throws when file missing and required", async () => {
    const source = new DotenvSource({ file: ".env", required: true, cwd })

    await expect(source.load()).rejects.toThrow()
  })

  it("is named after its file", () => {
    expect(new DotenvSource({ file: ".env.local", required: false }).name).toBe(
      "dotenv:.env.local",
    )
  })
})
