import type { DecodeResult } from "../../ports/codec"
import type { Snapshot, SnapshotPayload } from "../../ports/snapshot"
import type { AnyError } from "../any-error"
import { SnapshotCodec } from "./snapshot-codec"

const defaultCodec = new SnapshotCodec()

export function serialize(error: AnyError | Snapshot): SnapshotPayload {
  return defaultCodec.serialize(error)
}

export function deserialize(payload: unknown): DecodeResult<AnyError> {
  return defaultCodec.deserialize(payload)
}

export function deserializeOrThrow(payload: unknown): AnyError {
  return defaultCodec.deserializeOrThrow(payload)
}

export function stringify(error: AnyError | Snapshot): string {
  return defaultCodec.stringify(error)
}

export function parse(text: string): DecodeResult<AnyError> {
  return defaultCodec.parse(text)
}

export function parseOrThrow(text: string): AnyError {
  return defaultCodec.parseOrThrow(text)
}
