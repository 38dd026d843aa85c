import type { ErrorContext } from "../ports/error"
import { BaseError } from "./base-error"

export type MalformedPayloadReason =
  | "not_an_object"
  | "missing_field"
  | "wrong_kind"
  | "invalid_cause"
  | "too_deep"
  | "invalid_json"

export type MalformedPayloadIssue = Readonly<{
  reason: MalformedPayloadReason

  /** Nesting level that failed; 0 is the outermost payload. */
  depth: number

  /** Dotted field path of the failure, e.g. `cause.cause.message`. */
  path: string
}>

export type MalformedPayloadContext = ErrorContext & MalformedPayloadIssue

function describeIssue(issue: MalformedPayloadIssue): string {
  switch (issue.reason) {
    case "not_an_object":
      return "expected an object"
    case "missing_field":
      return `missing required field "${issue.path}"`
    case "wrong_kind":
      return `field "${issue.path}" must be a string`
    case "invalid_cause":
      return `field "${issue.path}" must be an object or null`
    case "too_deep":
      return `cause chain is deeper than ${issue.depth} levels`
    case "invalid_json":
      return "payload is not valid JSON"
  }
}

export class MalformedPayloadError extends BaseError<"malformed_payload"> {
  declare readonly context: MalformedPayloadContext

  readonly reason: MalformedPayloadReason
  readonly depth: number
  readonly path: string

  constructor(issue: MalformedPayloadIssue, options: { cause?: unknown } = {}) {
    super(`Malformed error payload at depth ${issue.depth}: ${describeIssue(issue)}`, {
      code: "malformed_payload",
      context: { ...issue },
      cause: options.cause,
    })

    this.reason = issue.reason
    this.depth = issue.depth
    this.path = issue.path
  }
}

export function isMalformedPayloadError(err: unknown): err is MalformedPayloadError {
  return err instanceof MalformedPayloadError
}
