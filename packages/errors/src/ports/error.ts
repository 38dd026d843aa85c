export type ErrorCode = Lowercase<string>

/**
 * Contextual metadata attached to errors.
 * Use this to carry structured data (IDs, inputs, etc.) without string munging.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

/**
 * The minimal capability capture operates on: a human-readable message and an
 * optional reference to whatever caused it.
 *
 * Every `Error` satisfies this, and so does a captured {@link AnyError}.
 */
export interface ReportableError {
  readonly message: string

  /**
   * Underlying cause
   *
   * See {@link https://developer.mozilla.org/en-US/docs/Web/JavaScript/Reference/Global_Objects/Error/cause Error.cause}
   */
  readonly cause?: unknown
}

export interface AppError extends Error {
  /** Error code for programmatic handling */
  readonly code: ErrorCode

  /** Structured metadata for debugging */
  readonly context: ErrorContext

  /**
   * Indicates whether this is an expected runtime failure (true) or a programmer
   * error / invariant violation (false).
   * @default true
   */
  readonly isOperational: boolean

  readonly cause?: unknown
}
