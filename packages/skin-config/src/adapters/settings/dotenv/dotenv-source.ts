import fs from "node:fs/promises"
import path from "node:path"
import { parse } from "dotenv"
import type { SettingsSource } from "../../../ports/settings-source"
import { SETTINGS_PREFIX, unprefixed } from "../settings-prefix"

export type DotenvSourceOptions = {
  /**
   * Path to the .env file, absolute or relative to `cwd`.
   *
   * @example ".env", ".env.local"
   */
  file: string

  /**
   * `true` throws when the file is missing; `false` yields no values.
   */
  required: boolean

  /** @default process.cwd() */
  cwd?: string

  /**
   * Only keys starting with this prefix are read; the prefix is stripped.
   * @default "SKIN_"
   */
  prefix?: string
}

export class DotenvSource implements SettingsSource {
  readonly name: string

  constructor(private readonly opts: DotenvSourceOptions) {
    this.name = `dotenv:${opts.file}`
  }

  async load(): Promise<Record<string, unknown>> {
    const filePath = path.resolve(this.opts.cwd ?? process.cwd(), this.opts.file)
    const prefix = this.opts.prefix ?? SETTINGS_PREFIX

    let content: string
    try {
      content = await fs.readFile(filePath, "utf-8")
    } catch (err) {
      if (!this.opts.required && (err as NodeJS.ErrnoException).code === "ENOENT") {
        return {}
      }
      throw err
    }

    return unprefixed(parse(content), prefix)
  }
}
