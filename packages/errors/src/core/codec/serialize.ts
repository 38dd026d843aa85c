import type { Snapshot, SnapshotPayload } from "../../ports/snapshot"

/** Renders a snapshot as its wire payload. The root cause is written as `cause: null`. */
export function serializeSnapshot(snapshot: Snapshot): SnapshotPayload {
  const root: SnapshotPayload = { type_label: snapshot.typeLabel, message: snapshot.message, cause: null }

  let tail = root
  for (let node = snapshot.cause; node; node = node.cause) {
    const next: SnapshotPayload = { type_label: node.typeLabel, message: node.message, cause: null }
    tail.cause = next
    tail = next
  }

  return root
}
