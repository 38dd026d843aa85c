import { createNullLogger, type Logger } from "@causeway/logger"
import type { CaptureOptions } from "../ports/capture-options"

/**
 * Default bound on chain length for both capture and deserialize.
 *
 * @remarks
 * Capture truncates longer chains to exactly this many levels and drops the
 * rest without a marker node. This is a policy outcome, not an error.
 */
export const DEFAULT_MAX_DEPTH = 50

export type ResolvedCaptureOptions = Readonly<{
  maxDepth: number
  logger: Logger
}>

export const DEFAULTS = {
  maxDepth: DEFAULT_MAX_DEPTH,
} as const

export function resolveCaptureOptions(options: CaptureOptions = {}): ResolvedCaptureOptions {
  const raw = options.maxDepth
  const maxDepth =
    typeof raw === "number" && Number.isFinite(raw)
      ? Math.max(1, Math.floor(raw))
      : DEFAULTS.maxDepth

  return {
    maxDepth,
    logger: options.logger ?? createNullLogger(),
  }
}
