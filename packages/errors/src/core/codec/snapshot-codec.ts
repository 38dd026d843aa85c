import type { Logger } from "@causeway/logger"
import type { DecodeResult, ISnapshotCodec } from "../../ports/codec"
import type { Snapshot, SnapshotPayload } from "../../ports/snapshot"
import { AnyError } from "../any-error"
import { resolveCaptureOptions } from "../options"
import { deserializeSnapshot, rejectPayload } from "./deserialize"
import { serializeSnapshot } from "./serialize"

export type SnapshotCodecDeps = {
  logger?: Logger
}

export type SnapshotCodecOptions = {
  /** Longest cause chain accepted by deserialize. @default DEFAULT_MAX_DEPTH */
  maxDepth?: number
}

function snapshotOf(error: AnyError | Snapshot): Snapshot {
  return error instanceof AnyError ? error.snapshot : error
}

export class SnapshotCodec implements ISnapshotCodec {
  private readonly logger: Logger
  private readonly maxDepth: number

  constructor(deps: SnapshotCodecDeps = {}, opts: SnapshotCodecOptions = {}) {
    const resolved = resolveCaptureOptions({ maxDepth: opts.maxDepth, logger: deps.logger })

    this.logger = resolved.logger
    this.maxDepth = resolved.maxDepth
  }

  serialize(error: AnyError | Snapshot): SnapshotPayload {
    return serializeSnapshot(snapshotOf(error))
  }

  deserialize(payload: unknown): DecodeResult<AnyError> {
    const result = deserializeSnapshot(payload, { maxDepth: this.maxDepth, logger: this.logger })
    if (!result.success) return result

    return { success: true, value: AnyError.fromSnapshot(result.value) }
  }

  deserializeOrThrow(payload: unknown): AnyError {
    const result = this.deserialize(payload)
    if (!result.success) throw result.error

    return result.value
  }

  stringify(error: AnyError | Snapshot): string {
    return JSON.stringify(this.serialize(error))
  }

  parse(text: string): DecodeResult<AnyError> {
    let payload: unknown
    try {
      payload = JSON.parse(text)
    } catch (err) {
      return rejectPayload({ reason: "invalid_json", depth: 0, path: "" }, this.logger, err)
    }

    return this.deserialize(payload)
  }

  parseOrThrow(text: string): AnyError {
    const result = this.parse(text)
    if (!result.success) throw result.error

    return result.value
  }
}

export function createSnapshotCodec(
  deps: SnapshotCodecDeps = {},
  opts: SnapshotCodecOptions = {},
): ISnapshotCodec {
  return new SnapshotCodec(deps, opts)
}
