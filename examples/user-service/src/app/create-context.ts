import { createPinoLogger, type Logger } from "@causeway/logger"
import { type AuthService, TokenAuthService } from "../external/auth"
import { InMemoryUserDatabase, type UserDatabase } from "../external/database"
import { createUserService, type IUserService } from "../domains/users/services/user-service"
import { type AppConfig, loadAppConfig } from "./config"

export type AppContextOptions = {
  env?: NodeJS.ProcessEnv
  logger?: Logger
  database?: UserDatabase
  auth?: AuthService
}

export type AppServices = {
  logger: Logger
  users: IUserService
}

export type AppContext = {
  config: AppConfig
  services: AppServices
}

export const DEMO_USERS = [
  { username: "alice", displayName: "Alice" },
  { username: "bob", displayName: "Bob" },
]

export const DEMO_TOKENS = {
  alice: "test-token-alice",
  bob: "test-token-bob",
}

export function createAppContext(options: AppContextOptions = {}): AppContext {
  const config = loadAppConfig(options.env ?? process.env)

  const logger =
    options.logger ??
    createPinoLogger(
      {},
      { level: config.logging.level, prettify: config.logging.prettify },
      { service: config.app.serviceName, env: config.app.env },
    )

  const users = createUserService(
    {
      database: options.database ?? new InMemoryUserDatabase(DEMO_USERS),
      auth: options.auth ?? new TokenAuthService(DEMO_TOKENS),
      logger,
    },
    { maxDepth: config.errors.maxDepth },
  )

  return { config, services: { logger, users } }
}
