import type { AnyError } from "../core/any-error"
import type { MalformedPayloadError } from "../core/malformed-payload-error"
import type { Snapshot, SnapshotPayload } from "./snapshot"

export type DecodeSuccess<T> = {
  success: true
  value: T
}

export type DecodeFailure = {
  success: false
  error: MalformedPayloadError
}

export type DecodeResult<T> = DecodeSuccess<T> | DecodeFailure

/**
 * Maps captured errors to and from the wire payload.
 *
 * @remarks
 * Decoding never throws: a malformed payload comes back as a
 * {@link DecodeFailure}. The `*OrThrow` variants are for callers that treat a
 * malformed payload as fatal.
 */
export interface ISnapshotCodec {
  serialize(error: AnyError | Snapshot): SnapshotPayload
  deserialize(payload: unknown): DecodeResult<AnyError>
  deserializeOrThrow(payload: unknown): AnyError

  /** JSON text of the serialized payload. */
  stringify(error: AnyError | Snapshot): string
  parse(text: string): DecodeResult<AnyError>
  parseOrThrow(text: string): AnyError
}
