import type { DestinationStream } from "pino"
import { PinoLogger } from "../../adapters/logger/pino/pino-logger"
import type { Logger } from "../../ports/logger"
import type { SettingsSource } from "../../ports/settings-source"
import { ProviderScope } from "../hierarchy/provider-scope"
import type { LoadedSettings } from "../settings/loaded-settings"
import { loadSettings } from "../settings/load-settings"
import type { RuntimeSettings } from "../settings/schema"

export type SkinRuntimeOptions = {
  /** Settings sources; defaults to the `SKIN_`-prefixed environment. */
  sources?: SettingsSource[]

  /** Use this logger instead of building one from settings. */
  logger?: Logger

  /** Where the settings-built pino logger writes. Ignored when `logger` is given. */
  destination?: DestinationStream
}

export type SkinRuntime = {
  settings: LoadedSettings
  logger: Logger
  root: ProviderScope
}

export function createLogger(
  settings: RuntimeSettings,
  destination?: DestinationStream,
): Logger {
  const { level, prettify, serviceName, env } = settings.logging

  return new PinoLogger(
    { ...(destination && { destination }) },
    { level, prettify },
    { service: serviceName, env },
  )
}

/**
 * Loads runtime settings and returns a root provider scope wired to a logger built
 * from them.
 *
 * @example
 * ```typescript
 * const { root } = await createSkinRuntime()
 * const requester = root.provide(userSource).provide(beatmapSource).requester()
 * ```
 */
export async function createSkinRuntime(options: SkinRuntimeOptions = {}): Promise<SkinRuntime> {
  const settings = await loadSettings({ ...(options.sources && { sources: options.sources }) })
  const logger = options.logger ?? createLogger(settings.value, options.destination)

  logger.debug("skin runtime ready", {
    logLevel: settings.value.logging.level,
    sources: settings.sourcesUsed(),
  })

  return {
    settings,
    logger,
    root: ProviderScope.root({ logger }),
  }
}
