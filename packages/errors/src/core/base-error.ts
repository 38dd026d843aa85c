import type { AppError, ErrorCode, ErrorContext } from "../ports/error"

export type BaseErrorOptions<C extends ErrorCode = ErrorCode> = Readonly<{
  code: C
  context?: ErrorContext
  cause?: unknown
  isOperational?: boolean
}>

export class BaseError<C extends ErrorCode = ErrorCode> extends Error implements AppError {
  readonly code: C
  readonly context: ErrorContext
  readonly isOperational: boolean

  constructor(message: string, options: BaseErrorOptions<C>) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined)

    this.name = new.target.name
    this.code = options.code
    this.context = Object.freeze({ ...options.context })
    this.isOperational = options.isOperational ?? true

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target)
    }
  }
}
