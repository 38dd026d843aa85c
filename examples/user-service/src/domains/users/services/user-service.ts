import type { CaptureOptions } from "@causeway/errors"
import type { Logger } from "@causeway/logger"
import { AuthError, type AuthService } from "../../../external/auth"
import { DatabaseError, type UserDatabase, type UserRecord } from "../../../external/database"
import { UserServiceError } from "../model/user-service.errors"

export interface IUserService {
  /**
   * Looks the user up, then verifies the token.
   *
   * @throws UserServiceError
   */
  authenticateUser(username: string, token: string): UserRecord
}

export type UserServiceDeps = {
  database: UserDatabase
  auth: AuthService
  logger: Logger
}

export type UserServiceOptions = {
  /** Longest cause chain kept when wrapping a dependency's error. */
  maxDepth?: number
}

export class UserService implements IUserService {
  private readonly capture: CaptureOptions

  constructor(
    private readonly deps: UserServiceDeps,
    opts: UserServiceOptions = {},
  ) {
    this.capture = {
      logger: deps.logger,
      ...(opts.maxDepth !== undefined && { maxDepth: opts.maxDepth }),
    }
  }

  authenticateUser(username: string, token: string): UserRecord {
    try {
      const user = this.findUser(username)
      this.verify(username, token)

      this.deps.logger.info("User authenticated", { operation: "authenticate", username })

      return user
    } catch (err) {
      if (err instanceof UserServiceError) {
        this.deps.logger.warn("User authentication failed", {
          operation: "authenticate",
          username,
          code: err.code,
          err,
        })
      }
      throw err
    }
  }

  private findUser(username: string): UserRecord {
    let user: UserRecord | undefined

    try {
      user = this.deps.database.findUser(username)
    } catch (err) {
      if (err instanceof DatabaseError) throw UserServiceError.database(err, this.capture)
      throw err
    }

    if (!user) throw UserServiceError.notFound(username)

    return user
  }

  private verify(username: string, token: string): void {
    try {
      this.deps.auth.verifyCredentials(username, token)
    } catch (err) {
      if (err instanceof AuthError) throw UserServiceError.authentication(err, this.capture)
      throw err
    }
  }
}

export function createUserService(
  deps: UserServiceDeps,
  opts: UserServiceOptions = {},
): IUserService {
  return new UserService(deps, opts)
}
