export { AnyError, fromAnyError, isAnyError, toAnyError } from "./core/any-error"
export { BaseError, type BaseErrorOptions } from "./core/base-error"
export { captureSnapshot } from "./core/capture"
export {
  deserialize,
  deserializeOrThrow,
  parse,
  parseOrThrow,
  serialize,
  stringify,
} from "./core/codec/default-codec"
export { deserializeSnapshot } from "./core/codec/deserialize"
export { serializeSnapshot } from "./core/codec/serialize"
export {
  SnapshotCodec,
  createSnapshotCodec,
  type SnapshotCodecDeps,
  type SnapshotCodecOptions,
} from "./core/codec/snapshot-codec"
export {
  MalformedPayloadError,
  isMalformedPayloadError,
  type MalformedPayloadContext,
  type MalformedPayloadIssue,
  type MalformedPayloadReason,
} from "./core/malformed-payload-error"
export {
  DEFAULT_MAX_DEPTH,
  DEFAULTS,
  resolveCaptureOptions,
  type ResolvedCaptureOptions,
} from "./core/options"
export {
  buildSnapshot,
  createSnapshot,
  snapshotChain,
  snapshotDepth,
  snapshotsEqual,
} from "./core/snapshot"
export { typeLabelOf } from "./core/type-label"
export { errorChain } from "./core/utils/error-chain"
export type { CaptureOptions } from "./ports/capture-options"
export type { DecodeFailure, DecodeResult, DecodeSuccess, ISnapshotCodec } from "./ports/codec"
export type { AppError, ErrorCode, ErrorContext, ReportableError } from "./ports/error"
export type { Snapshot, SnapshotFields, SnapshotInit, SnapshotPayload } from "./ports/snapshot"
