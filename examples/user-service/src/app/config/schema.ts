import { DEFAULT_MAX_DEPTH } from "@causeway/errors"
import { type LogLevelName, logLevelNames } from "@causeway/logger"
import { z } from "zod/mini"

const booleanFlag = z.pipe(
  z.enum(["true", "false", "1", "0"]),
  z.transform((v) => v === "true" || v === "1"),
)

const positiveInt = z
  .coerce.number()
  .check(z.refine((v) => Number.isInteger(v) && v >= 1, { error: "Expected a positive integer" }))

export const envSchema = z.object({
  APP_ENV: z._default(z.string(), "development"),
  SERVICE_NAME: z._default(z.string(), "user-service"),

  LOG_LEVEL: z._default(z.enum(logLevelNames), "info"),
  LOG_PRETTY: z._default(booleanFlag, false),

  ERROR_CHAIN_MAX_DEPTH: z._default(positiveInt, DEFAULT_MAX_DEPTH),
})

export type EnvConfig = z.infer<typeof envSchema>

export type AppConfig = {
  app: {
    env: string
    serviceName: string
  }

  logging: {
    level: LogLevelName
    prettify: boolean
  }

  errors: {
    maxDepth: number
  }
}
