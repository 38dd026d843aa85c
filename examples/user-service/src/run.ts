import { type AnyError, errorChain } from "@causeway/errors"
import { type AppContextOptions, createAppContext, DEMO_TOKENS, DEMO_USERS } from "./app/create-context"
import {
  UserServiceError,
  type UserServiceErrorEnvelope,
} from "./domains/users/model/user-service.errors"
import { DatabaseError, InMemoryUserDatabase } from "./external/database"

type Scenario = {
  name: string
  username: string
  token: string
  options?: AppContextOptions
}

export type ScenarioOutcome =
  | { scenario: string; ok: true }
  | { scenario: string; ok: false; rendered: string; envelope: UserServiceErrorEnvelope }

const SCENARIOS: Scenario[] = [
  { name: "valid credentials", username: "alice", token: DEMO_TOKENS.alice },
  { name: "unknown user", username: "unknown", token: "test-token" },
  { name: "wrong token", username: "bob", token: "test-token-wrong" },
  {
    name: "database unavailable",
    username: "alice",
    token: DEMO_TOKENS.alice,
    options: {
      database: new InMemoryUserDatabase(
        DEMO_USERS,
        new DatabaseError("connection_failed", {
          cause: new Error("connect ECONNREFUSED 127.0.0.1:5432"),
        }),
      ),
    },
  },
]

/**
 * Runs each scenario against a fresh context, logs the outcome and checks
 * that failures survive a trip through JSON.
 */
export function run(options: AppContextOptions = {}): ScenarioOutcome[] {
  return SCENARIOS.map((scenario) => {
    const { services } = createAppContext({ ...options, ...scenario.options })
    const logger = services.logger.child({ operation: "demo" })

    try {
      services.users.authenticateUser(scenario.username, scenario.token)
      logger.info("Scenario passed", { scenario: scenario.name })

      return { scenario: scenario.name, ok: true }
    } catch (err) {
      if (!(err instanceof UserServiceError)) throw err

      const envelope = err.toJSON()
      const restored = UserServiceError.fromJSON(JSON.parse(JSON.stringify(envelope)))
      const cause: AnyError | undefined =
        restored.variant.code === "app.service.user.not_found" ? undefined : restored.variant.source

      logger.info("Scenario failed", {
        scenario: scenario.name,
        rendered: err.message,
        envelope,
        restored: restored.message,
        chainLength: errorChain(cause).length,
      })

      return { scenario: scenario.name, ok: false, rendered: err.message, envelope }
    }
  })
}
