import { deserializeSnapshot, pathAt } from "../deserialize"
import { serializeSnapshot } from "../serialize"
import { createSnapshot } from "../../snapshot"

describe("pathAt", () => {
  it("joins one cause segment per level", () => {
    expect(pathAt(0)).toBe("")
    expect(pathAt(0, "message")).toBe("message")
    expect(pathAt(2, "type_label")).toBe("cause.cause.type_label")
    expect(pathAt(3)).toBe("cause.cause.cause")
  })
})

describe("deserializeSnapshot", () => {
  it("returns a frozen snapshot", () => {
    const result = deserializeSnapshot({ type_label: "E", message: "m", cause: { type_label: "F", message: "n" } })

    expect(result.success).toBe(true)
    if (!result.success) return
    expect(result.value).toEqual({ typeLabel: "E", message: "m", cause: { typeLabel: "F", message: "n" } })
    expect(Object.isFrozen(result.value)).toBe(true)
    expect(Object.isFrozen(result.value.cause)).toBe(true)
  })

  it("takes maxDepth from the options", () => {
    const payload = serializeSnapshot(
      createSnapshot({ typeLabel: "A", message: "a", cause: { typeLabel: "B", message: "b" } }),
    )

    expect(deserializeSnapshot(payload, { maxDepth: 2 }).success).toBe(true)
    expect(deserializeSnapshot(payload, { maxDepth: 1 }).success).toBe(false)
  })
})

describe("deserializeSnapshot on hostile input", () => {
  it("rejects a payload whose getter throws", () => {
    const boom = new Error("boom")
    const payload = {
      type_label: "E",
      get message(): string {
        throw boom
      },
    }

    const result = deserializeSnapshot(payload)

    expect(result.success).toBe(false)
    if (result.success) return
    expect(result.error.context).toEqual({ reason: "not_an_object", depth: 0, path: "" })
    expect(result.error.cause).toBe(boom)
  })

  it("rejects a revoked proxy", () => {
    const { proxy, revoke } = Proxy.revocable({}, {})
    revoke()

    const result = deserializeSnapshot(proxy)

    expect(result.success).toBe(false)
    if (result.success) return
    expect(result.error.reason).toBe("not_an_object")
    expect(result.error.depth).toBe(0)
  })

  it("rejects a nested cause whose getter throws", () => {
    const result = deserializeSnapshot({
      type_label: "A",
      message: "a",
      cause: {
        type_label: "B",
        get message(): string {
          throw new Error("boom")
        },
      },
    })

    expect(result.success).toBe(false)
  })
})

describe("deserializeSnapshot field classification", () => {
  it("reports a field set to undefined as missing", () => {
    const result = deserializeSnapshot({ type_label: "E", message: undefined })

    expect(result.success).toBe(false)
    if (result.success) return
    expect(result.error.context).toEqual({ reason: "missing_field", depth: 0, path: "message" })
  })

  it("ignores symbol-keyed fields on nested causes", () => {
    const result = deserializeSnapshot({
      type_label: "A",
      message: "a",
      cause: { type_label: "B", message: "b", [Symbol("meta")]: 1 },
    })

    expect(result.success).toBe(true)
    if (!result.success) return
    expect(result.value).toEqual({ typeLabel: "A", message: "a", cause: { typeLabel: "B", message: "b" } })
  })
})
