import type { Snapshot, SnapshotFields, SnapshotInit } from "../ports/snapshot"

function freezeNode(fields: SnapshotFields, cause: Snapshot | undefined): Snapshot {
  const node: Snapshot = cause
    ? { typeLabel: fields.typeLabel, message: fields.message, cause }
    : { typeLabel: fields.typeLabel, message: fields.message }

  return Object.freeze(node)
}

/**
 * Builds a frozen chain from its levels, outermost first. Nodes are created
 * bottom-up so each one is frozen with its final cause.
 */
export function buildSnapshot(levels: readonly SnapshotFields[]): Snapshot {
  const root = levels.reduceRight<Snapshot | undefined>(
    (cause, level) => freezeNode(level, cause),
    undefined,
  )

  if (!root) {
    throw new RangeError("A snapshot needs at least one level")
  }

  return root
}

/**
 * Creates a frozen snapshot from plain fields.
 *
 * @throws TypeError when `init` refers back to one of its own nodes.
 */
export function createSnapshot(init: SnapshotInit): Snapshot {
  const levels: SnapshotFields[] = []
  const seen = new WeakSet<object>()

  let current: SnapshotInit | null | undefined = init

  while (current) {
    if (seen.has(current)) {
      throw new TypeError("A snapshot's cause chain must not contain cycles")
    }
    seen.add(current)

    levels.push({ typeLabel: current.typeLabel, message: current.message })
    current = current.cause
  }

  return buildSnapshot(levels)
}

/** The nodes of a chain, outermost first. */
export function snapshotChain(snapshot: Snapshot): Snapshot[] {
  const chain: Snapshot[] = []

  for (let node: Snapshot | undefined = snapshot; node; node = node.cause) {
    chain.push(node)
  }

  return chain
}

export function snapshotDepth(snapshot: Snapshot): number {
  return snapshotChain(snapshot).length
}

/**
 * Structural equality over `typeLabel`, `message` and the full cause chain.
 */
export function snapshotsEqual(a: Snapshot, b: Snapshot): boolean {
  const left = snapshotChain(a)
  const right = snapshotChain(b)

  if (left.length !== right.length) return false

  return left.every((node, i) => {
    const other = right[i]
    return (
      other !== undefined &&
      node.typeLabel === other.typeLabel &&
      node.message === other.message
    )
  })
}
