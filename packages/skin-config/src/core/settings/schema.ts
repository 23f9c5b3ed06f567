import { z } from "zod/mini"
import { type LogLevelName, logLevelNames } from "../../ports/log-level"

export const settingsSchema = z.object({
  LOG_LEVEL: z._default(z.enum(logLevelNames), "info"),
  LOG_PRETTY: z._default(z.stringbool(), false),
  SERVICE_NAME: z._default(z.string(), "skinlayer"),
  ENV: z._default(z.string(), "development"),
})

export type RawSettings = z.infer<typeof settingsSchema>

export type RuntimeSettings = {
  logging: {
    level: LogLevelName
    prettify: boolean
    serviceName: string
    env: string
  }
}

export function mapRawSettings(raw: RawSettings): RuntimeSettings {
  return {
    logging: {
      level: raw.LOG_LEVEL,
      prettify: raw.LOG_PRETTY,
      serviceName: raw.SERVICE_NAME,
      env: raw.ENV,
    },
  }
}
