import type { Logger } from "@causeway/logger"
import { z } from "zod"
import type { CaptureOptions } from "../../ports/capture-options"
import type { DecodeResult } from "../../ports/codec"
import type { Snapshot, SnapshotFields } from "../../ports/snapshot"
import {
  MalformedPayloadError,
  type MalformedPayloadIssue,
  type MalformedPayloadReason,
} from "../malformed-payload-error"
import { resolveCaptureOptions } from "../options"
import { buildSnapshot } from "../snapshot"
import { isObjectLike, readProperty } from "../utils/read-property"

/** One level of the wire payload. The nested cause is validated on the next pass. */
const payloadNodeSchema = z.object({
  type_label: z.string(),
  message: z.string(),
  cause: z.looseObject({}).nullish(),
})

type PayloadNode = z.infer<typeof payloadNodeSchema>

/** `cause.cause.message` for depth 2, field `message`. */
export function pathAt(depth: number, field?: string): string {
  const segments: string[] = Array.from({ length: depth }, () => "cause")
  if (field) segments.push(field)

  return segments.join(".")
}

function hasValue(node: unknown, field: PropertyKey): boolean {
  return isObjectLike(node) && readProperty(node, field) !== undefined
}

type SchemaIssues = {
  issues: ReadonlyArray<{ path: ReadonlyArray<PropertyKey> }>
}

function classify(node: unknown, error: SchemaIssues, depth: number): MalformedPayloadIssue {
  const [issue] = error.issues
  const field = issue?.path[0]

  if (typeof field !== "string") {
    return { reason: "not_an_object", depth, path: pathAt(depth) }
  }

  let reason: MalformedPayloadReason
  if (field === "cause") reason = "invalid_cause"
  else if (hasValue(node, field)) reason = "wrong_kind"
  else reason = "missing_field"

  return { reason, depth, path: pathAt(depth, field) }
}

export function rejectPayload(
  issue: MalformedPayloadIssue,
  logger: Logger,
  cause?: unknown,
): DecodeResult<never> {
  logger.debug("rejected malformed error payload", {
    operation: "deserialize",
    reason: issue.reason,
    depth: issue.depth,
    path: issue.path,
  })

  return { success: false, error: new MalformedPayloadError(issue, { cause }) }
}

/**
 * Validates a wire payload level by level and rebuilds the snapshot.
 *
 * Never throws and never mutates `payload`. Unknown fields are ignored. A
 * chain with more than `maxDepth` levels is rejected as `too_deep`, and input
 * whose getters or proxy traps throw is rejected as `not_an_object`.
 */
export function deserializeSnapshot(
  payload: unknown,
  options: CaptureOptions = {},
): DecodeResult<Snapshot> {
  const { maxDepth, logger } = resolveCaptureOptions(options)
  const levels: SnapshotFields[] = []

  let current: unknown = payload
  let depth = 0

  while (true) {
    if (depth >= maxDepth) {
      return rejectPayload({ reason: "too_deep", depth: maxDepth, path: pathAt(depth) }, logger)
    }

    let parsed: z.ZodSafeParseResult<PayloadNode>
    try {
      parsed = payloadNodeSchema.safeParse(current)
    } catch (err) {
      // a getter or proxy trap on the input threw
      return rejectPayload({ reason: "not_an_object", depth, path: pathAt(depth) }, logger, err)
    }

    if (!parsed.success) {
      return rejectPayload(classify(current, parsed.error, depth), logger)
    }

    const node: PayloadNode = parsed.data
    levels.push({ typeLabel: node.type_label, message: node.message })

    if (node.cause == null) break

    current = node.cause
    depth += 1
  }

  return { success: true, value: buildSnapshot(levels) }
}
