import { isObjectLike, readProperty, readString } from "./utils/read-property"

const GENERIC_CONSTRUCTORS: ReadonlySet<string> = new Set(["Object", "Error"])

function constructorName(value: object): string | undefined {
  const ctor = readProperty(value, "constructor")
  if (typeof ctor !== "function") return undefined

  return readString(ctor, "name") || undefined
}

/**
 * Derives the type label recorded for one level of a captured chain.
 *
 * Resolution order:
 * 1. a string `typeLabel` property (captured errors, or classes that declare a
 *    stable namespaced label)
 * 2. the constructor name, unless it is `Object` or `Error`
 * 3. a non-empty string `name` property, then the constructor name
 * 4. `typeof` for primitives, `"null"` for null
 *
 * @example
 * ```ts
 * typeLabelOf(new TypeError("x"))           // "TypeError"
 * typeLabelOf({ name: "Quota", message: "" }) // "Quota"
 * typeLabelOf("boom")                       // "string"
 * ```
 */
export function typeLabelOf(value: unknown): string {
  if (value === null) return "null"
  if (!isObjectLike(value)) return typeof value

  const declared = readString(value, "typeLabel")
  if (declared !== undefined) return declared

  const ctorName = constructorName(value)
  if (ctorName && !GENERIC_CONSTRUCTORS.has(ctorName)) return ctorName

  return readString(value, "name") || ctorName || "Object"
}
