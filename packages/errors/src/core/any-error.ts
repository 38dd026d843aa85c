import type { CaptureOptions } from "../ports/capture-options"
import type { ReportableError } from "../ports/error"
import type { Snapshot, SnapshotInit, SnapshotPayload } from "../ports/snapshot"
import { captureSnapshot } from "./capture"
import { serializeSnapshot } from "./codec/serialize"
import { createSnapshot, snapshotChain } from "./snapshot"

/**
 * A captured error: message, type label and cause chain, detached from the
 * value it was captured from.
 *
 * `AnyError` is itself a reportable error, so it can be the cause of another
 * error, and capturing it again yields an equal snapshot.
 *
 * @example
 * ```ts
 * try {
 *   await db.query(sql)
 * } catch (err) {
 *   throw new QueryError("lookup failed", { cause: toAnyError(err) })
 * }
 * ```
 */
export class AnyError extends Error {
  declare readonly cause: AnyError | undefined

  readonly typeLabel: string
  readonly snapshot: Snapshot

  private constructor(snapshot: Snapshot, cause: AnyError | undefined) {
    super(snapshot.message, cause ? { cause } : undefined)

    this.name = "AnyError"
    this.typeLabel = snapshot.typeLabel
    this.snapshot = snapshot
  }

  /** Wraps a frozen copy of `snapshot`. Cause wrappers are built bottom-up. */
  static fromSnapshot(init: SnapshotInit): AnyError {
    const snapshot = createSnapshot(init)
    const causes = snapshot.cause ? snapshotChain(snapshot.cause) : []

    const cause = causes.reduceRight<AnyError | undefined>(
      (inner, node) => new AnyError(node, inner),
      undefined,
    )

    return new AnyError(snapshot, cause)
  }

  /** `"<typeLabel>: <message>"`, then `"(<cause>)"` for each cause level. */
  toString(): string {
    const nodes = snapshotChain(this.snapshot)
    const rendered = nodes.map((node) => `${node.typeLabel}: ${node.message}`).join("(")

    return rendered + ")".repeat(nodes.length - 1)
  }

  toJSON(): SnapshotPayload {
    return serializeSnapshot(this.snapshot)
  }
}

/**
 * Explicit conversion of a reportable error into an {@link AnyError}. Call it
 * wherever an opaque error crosses into a domain error.
 */
export function fromAnyError(error: ReportableError, options?: CaptureOptions): AnyError {
  return AnyError.fromSnapshot(captureSnapshot(error, options))
}

/**
 * Same as {@link fromAnyError} for values caught from `catch`. An `AnyError`
 * passes through unchanged.
 */
export function toAnyError(thrown: unknown, options?: CaptureOptions): AnyError {
  if (thrown instanceof AnyError) return thrown

  return AnyError.fromSnapshot(captureSnapshot(thrown, options))
}

export function isAnyError(value: unknown): value is AnyError {
  return value instanceof AnyError
}
