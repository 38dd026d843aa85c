import { DEFAULT_MAX_DEPTH } from "../options"
import { isObjectLike, readProperty } from "./read-property"

export function causeOf(v: unknown): unknown {
  return isObjectLike(v) ? readProperty(v, "cause") : undefined
}

/**
 * Walk the error cause chain and return all values encountered.
 *
 * Safety:
 * - maxDepth guardrail (default {@link DEFAULT_MAX_DEPTH})
 * - cycle detection via WeakSet
 *
 * Works the same on live errors and on captured `AnyError` chains.
 *
 * @example
 * ```ts
 * catch (err) {
 *   for (const e of errorChain(err)) {
 *     console.log(e instanceof Error ? e.message : e)
 *   }
 * }
 * ```
 */
export function errorChain(err: unknown, maxDepth: number = DEFAULT_MAX_DEPTH): unknown[] {
  const chain: unknown[] = []
  const seen = new WeakSet<object>()

  let current: unknown = err

  while (current != null && chain.length < maxDepth) {
    if (isObjectLike(current)) {
      if (seen.has(current)) break
      seen.add(current)
    }

    chain.push(current)

    current = causeOf(current)
  }

  return chain
}
