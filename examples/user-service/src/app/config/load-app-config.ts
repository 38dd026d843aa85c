import { z } from "zod"
import { type AppConfig, type EnvConfig, envSchema } from "./schema"

export function mapEnvToConfig(env: EnvConfig): AppConfig {
  return {
    app: {
      env: env.APP_ENV,
      serviceName: env.SERVICE_NAME,
    },
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
    },
    errors: {
      maxDepth: env.ERROR_CHAIN_MAX_DEPTH,
    },
  }
}

export function loadAppConfig(env: NodeJS.ProcessEnv): AppConfig {
  const result = envSchema.safeParse(env)

  if (!result.success) {
    throw new Error(`Configuration validation failed:\n${z.prettifyError(result.error)}`)
  }

  return mapEnvToConfig(result.data)
}
