import { AnyError, MalformedPayloadError } from "@causeway/errors"
import { AuthError } from "../../../../external/auth"
import { DatabaseError } from "../../../../external/database"
import { UserServiceError, isUserServiceError } from "../user-service.errors"

describe("UserServiceError", () => {
  describe("database", () => {
    it("wraps the captured driver error", () => {
      const err = UserServiceError.database(new DatabaseError("row_not_found"))

      expect(err.code).toBe("app.service.user.database")
      expect(err.name).toBe("UserServiceError")
      expect(err.message).toBe("Database error: DatabaseError: Row not found")
      expect(err.cause).toBeInstanceOf(AnyError)
    })

    it("serializes to the envelope", () => {
      const err = UserServiceError.database(new DatabaseError("row_not_found"))

      expect(err.toJSON()).toEqual({
        $type: "app.service.user.database",
        context: { type_label: "DatabaseError", message: "Row not found", cause: null },
      })
    })

    it("honours the capture depth", () => {
      const driver = new DatabaseError("query_failed", { cause: new Error("syntax error at or near FROM") })

      const err = UserServiceError.database(driver, { maxDepth: 1 })

      expect(err.message).toBe("Database error: DatabaseError: Query execution failed")
    })
  })

  describe("authentication", () => {
    it("renders the whole cause chain", () => {
      const err = UserServiceError.authentication(
        new AuthError("Invalid token", { cause: new Error("token signature mismatch") }),
      )

      expect(err.code).toBe("app.service.user.auth")
      expect(err.message).toBe(
        "Authentication error: AuthError: Authentication error: Invalid token(Error: token signature mismatch)",
      )
      expect(JSON.stringify(err)).toBe(
        '{"$type":"app.service.user.auth","context":{"type_label":"AuthError",' +
          '"message":"Authentication error: Invalid token",' +
          '"cause":{"type_label":"Error","message":"token signature mismatch","cause":null}}}',
      )
    })
  })

  describe("notFound", () => {
    it("carries the username", () => {
      const err = UserServiceError.notFound("unknown")

      expect(err.code).toBe("app.service.user.not_found")
      expect(err.message).toBe("User not found: unknown")
      expect(err.context).toEqual({ username: "unknown" })
      expect(err.toJSON()).toEqual({ $type: "app.service.user.not_found", context: "unknown" })
    })
  })

  describe("fromJSON", () => {
    it("restores a captured variant", () => {
      const original = UserServiceError.authentication(
        new AuthError("Invalid token", { cause: new Error("token signature mismatch") }),
      )

      const restored = UserServiceError.fromJSON(JSON.parse(JSON.stringify(original)))

      expect(restored.code).toBe(original.code)
      expect(restored.message).toBe(original.message)
      expect(restored.toJSON()).toEqual(original.toJSON())
    })

    it("restores the not-found variant", () => {
      const restored = UserServiceError.fromJSON({ $type: "app.service.user.not_found", context: "carol" })

      expect(restored.message).toBe("User not found: carol")
    })

    it("rejects an unknown $type", () => {
      expect(() => UserServiceError.fromJSON({ $type: "app.service.user.other", context: "x" })).toThrow(
        /^Invalid user service error envelope:/,
      )
    })

    it("rejects a malformed captured payload", () => {
      expect(() =>
        UserServiceError.fromJSON({ $type: "app.service.user.database", context: { type_label: "E" } }),
      ).toThrow(MalformedPayloadError)
    })
  })

  it("isUserServiceError narrows", () => {
    expect(isUserServiceError(UserServiceError.notFound("x"))).toBe(true)
    expect(isUserServiceError(new Error("x"))).toBe(false)
  })
})
