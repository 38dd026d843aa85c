/**
 * One node of a captured error chain.
 *
 * Snapshots produced by this package are deeply frozen and hold no reference
 * to the error they were captured from.
 */
export type Snapshot = Readonly<{
  /** Identifier for the captured error's declared type. Diagnostics only. */
  typeLabel: string

  /** The error's message, read once at capture time. */
  message: string

  /** The next error in the chain; absent for the root cause. */
  cause?: Snapshot
}>

export type SnapshotFields = Readonly<{
  typeLabel: string
  message: string
}>

/**
 * Plain input accepted by `createSnapshot`. `null` and `undefined` causes both
 * mean "no cause".
 */
export type SnapshotInit = Readonly<{
  typeLabel: string
  message: string
  cause?: SnapshotInit | null
}>

/**
 * Wire shape of a snapshot. Field names are the stable transport contract.
 *
 * Designed to be JSON.stringify-safe.
 */
export type SnapshotPayload = {
  type_label: string
  message: string
  cause: SnapshotPayload | null
}
