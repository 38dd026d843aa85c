import type { Logger } from "@causeway/logger"

export type CaptureOptions = Readonly<{
  /**
   * Maximum number of chain levels kept by capture and accepted by
   * deserialize. Longer chains are truncated on capture and rejected on
   * deserialize.
   *
   * @default DEFAULT_MAX_DEPTH
   */
  maxDepth?: number

  /**
   * Receives `debug` entries when a chain is truncated, a cycle is cut or a
   * payload is rejected.
   *
   * @default NullLogger
   */
  logger?: Logger
}>
