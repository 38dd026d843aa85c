export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

export function isObjectLike(v: unknown): v is object {
  return isRecord(v) || typeof v === "function"
}

/**
 * Reads a property from a foreign value. A getter or proxy trap that throws
 * reads as `undefined`, so capture stays total.
 */
export function readProperty(target: object, key: PropertyKey): unknown {
  try {
    return Reflect.get(target, key)
  } catch {
    return undefined
  }
}

export function readString(target: object, key: PropertyKey): string | undefined {
  const value = readProperty(target, key)

  return typeof value === "string" ? value : undefined
}
