import {
  type AnyError,
  BaseError,
  type CaptureOptions,
  deserializeOrThrow,
  fromAnyError,
  type ReportableError,
  type SnapshotPayload,
} from "@causeway/errors"
import { prettifyError } from "zod"
import { z } from "zod/mini"

export type UserServiceErrorCode =
  | "app.service.user.database"
  | "app.service.user.auth"
  | "app.service.user.not_found"

type UserServiceErrorVariant =
  | { code: "app.service.user.database"; source: AnyError }
  | { code: "app.service.user.auth"; source: AnyError }
  | { code: "app.service.user.not_found"; username: string }

/** Wire form: the code under `$type`, the captured error or username under `context`. */
export type UserServiceErrorEnvelope =
  | { $type: "app.service.user.database"; context: SnapshotPayload }
  | { $type: "app.service.user.auth"; context: SnapshotPayload }
  | { $type: "app.service.user.not_found"; context: string }

const envelopeSchema = z.union([
  z.object({ $type: z.literal("app.service.user.database"), context: z.unknown() }),
  z.object({ $type: z.literal("app.service.user.auth"), context: z.unknown() }),
  z.object({ $type: z.literal("app.service.user.not_found"), context: z.string() }),
])

export class UserServiceError extends BaseError<UserServiceErrorCode> {
  private constructor(
    message: string,
    readonly variant: UserServiceErrorVariant,
  ) {
    super(message, {
      code: variant.code,
      ...("source" in variant
        ? { cause: variant.source }
        : { context: { username: variant.username } }),
    })
  }

  static database(error: ReportableError, options?: CaptureOptions): UserServiceError {
    const source = fromAnyError(error, options)

    return new UserServiceError(`Database error: ${source.toString()}`, {
      code: "app.service.user.database",
      source,
    })
  }

  static authentication(error: ReportableError, options?: CaptureOptions): UserServiceError {
    const source = fromAnyError(error, options)

    return new UserServiceError(`Authentication error: ${source.toString()}`, {
      code: "app.service.user.auth",
      source,
    })
  }

  static notFound(username: string): UserServiceError {
    return new UserServiceError(`User not found: ${username}`, {
      code: "app.service.user.not_found",
      username,
    })
  }

  /**
   * Reads an envelope produced by {@link UserServiceError.toJSON}.
   *
   * @throws Error when the envelope shape is wrong
   * @throws MalformedPayloadError when the captured error payload is malformed
   */
  static fromJSON(value: unknown): UserServiceError {
    const result = envelopeSchema.safeParse(value)

    if (!result.success) {
      throw new Error(`Invalid user service error envelope:\n${prettifyError(result.error)}`)
    }

    const envelope = result.data

    switch (envelope.$type) {
      case "app.service.user.database":
        return UserServiceError.database(deserializeOrThrow(envelope.context))
      case "app.service.user.auth":
        return UserServiceError.authentication(deserializeOrThrow(envelope.context))
      case "app.service.user.not_found":
        return UserServiceError.notFound(envelope.context)
    }
  }

  toJSON(): UserServiceErrorEnvelope {
    const { variant } = this

    switch (variant.code) {
      case "app.service.user.database":
      case "app.service.user.auth":
        return { $type: variant.code, context: variant.source.toJSON() }
      case "app.service.user.not_found":
        return { $type: variant.code, context: variant.username }
    }
  }
}

export function isUserServiceError(err: unknown): err is UserServiceError {
  return err instanceof UserServiceError
}
