import type { CaptureOptions } from "../ports/capture-options"
import type { Snapshot, SnapshotFields } from "../ports/snapshot"
import { resolveCaptureOptions } from "./options"
import { buildSnapshot } from "./snapshot"
import { typeLabelOf } from "./type-label"
import { causeOf, errorChain } from "./utils/error-chain"
import { isObjectLike, readString } from "./utils/read-property"

const UNKNOWN_MESSAGE = "Unknown error"

function messageOf(value: unknown): string {
  if (typeof value === "string") return value
  if (isObjectLike(value)) return readString(value, "message") ?? UNKNOWN_MESSAGE

  return String(value)
}

function describe(value: unknown): SnapshotFields {
  return { typeLabel: typeLabelOf(value), message: messageOf(value) }
}

/**
 * Capture an error and its cause chain as a frozen {@link Snapshot}.
 *
 * Never throws. Anything can be captured: values without a string `message`
 * get `"Unknown error"`, primitives are rendered with `String()`, and `null` or
 * `undefined` causes end the chain.
 *
 * The walk stops after `maxDepth` levels, or at the first cause that refers
 * back to a level already captured.
 */
export function captureSnapshot(error: unknown, options: CaptureOptions = {}): Snapshot {
  const { maxDepth, logger } = resolveCaptureOptions(options)

  const chain = errorChain(error, maxDepth)
  const levels = chain.length > 0 ? chain.map(describe) : [describe(error)]

  const last = chain[chain.length - 1]
  const rest = causeOf(last)

  if (chain.length > 0 && rest != null) {
    const meta = { operation: "capture", typeLabel: levels[0]?.typeLabel, maxDepth }

    if (chain.includes(rest)) {
      logger.debug("error cause chain refers back to itself; cycle cut", meta)
    } else {
      logger.debug("error cause chain truncated", meta)
    }
  }

  return buildSnapshot(levels)
}
