import { BaseError } from "../base-error"
import {
  MalformedPayloadError,
  type MalformedPayloadReason,
  isMalformedPayloadError,
} from "../malformed-payload-error"

const descriptions: Array<[MalformedPayloadReason, number, string, string]> = [
  ["not_an_object", 0, "", "Malformed error payload at depth 0: expected an object"],
  [
    "missing_field",
    1,
    "cause.message",
    'Malformed error payload at depth 1: missing required field "cause.message"',
  ],
  ["wrong_kind", 0, "type_label", 'Malformed error payload at depth 0: field "type_label" must be a string'],
  ["invalid_cause", 0, "cause", 'Malformed error payload at depth 0: field "cause" must be an object or null'],
  [
    "too_deep",
    5,
    "cause.cause.cause.cause.cause",
    "Malformed error payload at depth 5: cause chain is deeper than 5 levels",
  ],
  ["invalid_json", 0, "", "Malformed error payload at depth 0: payload is not valid JSON"],
]

describe("MalformedPayloadError", () => {
  it("carries the issue as fields and frozen context", () => {
    const err = new MalformedPayloadError({ reason: "wrong_kind", depth: 2, path: "cause.cause.type_label" })

    expect(err).toBeInstanceOf(BaseError)
    expect(err.name).toBe("MalformedPayloadError")
    expect(err.code).toBe("malformed_payload")
    expect(err.isOperational).toBe(true)
    expect(err.reason).toBe("wrong_kind")
    expect(err.depth).toBe(2)
    expect(err.path).toBe("cause.cause.type_label")
    expect(err.context).toEqual({ reason: "wrong_kind", depth: 2, path: "cause.cause.type_label" })
    expect(Object.isFrozen(err.context)).toBe(true)
  })

  it.each(descriptions)("describes %s", (reason, depth, path, message) => {
    expect(new MalformedPayloadError({ reason, depth, path }).message).toBe(message)
  })

  it("keeps the underlying cause", () => {
    const cause = new SyntaxError("Unexpected end of JSON input")
    const err = new MalformedPayloadError({ reason: "invalid_json", depth: 0, path: "" }, { cause })

    expect(err.cause).toBe(cause)
  })

  it("isMalformedPayloadError narrows", () => {
    expect(isMalformedPayloadError(new MalformedPayloadError({ reason: "too_deep", depth: 1, path: "cause" }))).toBe(
      true,
    )
    expect(isMalformedPayloadError(new Error("x"))).toBe(false)
  })
})
