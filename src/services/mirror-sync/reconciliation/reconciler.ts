import type {
  EntityDefinition,
  SnapshotBatch,
  SnapshotRecord,
  StoredEntry,
} from '@root/types/entities.types.js'
import { MalformedSnapshotError } from '@root/types/errors.js'
import type {
  Reconciliation,
  SyncAnomaly,
} from '@root/types/mirror-sync.types.js'
import { comparisonKey } from '../identity/fingerprint.js'
import { resolveRemovals } from '../tombstone/deletion-policy.js'

/**
 * Collapses repeated uids so the last occurrence wins. The surviving record
 * takes the position of its last occurrence in iteration order.
 */
function dedupeByUid(
  definition: EntityDefinition,
  records: readonly SnapshotRecord[],
): { latest: Map<string, SnapshotRecord>; anomalies: SyncAnomaly[] } {
  const latest = new Map<string, SnapshotRecord>()
  const occurrences = new Map<string, number>()

  for (const record of records) {
    if (typeof record.uid !== 'string' || record.uid === '') {
      throw new MalformedSnapshotError(definition.type, null, 'missing uid')
    }
    occurrences.set(record.uid, (occurrences.get(record.uid) ?? 0) + 1)
    latest.delete(record.uid)
    latest.set(record.uid, record)
  }

  const anomalies: SyncAnomaly[] = []
  for (const [uid, count] of occurrences) {
    if (count > 1) {
      anomalies.push({
        kind: 'duplicate-uid',
        entityType: definition.type,
        uid,
        occurrences: count,
      })
    }
  }

  return { latest, anomalies }
}

/**
 * Classifies every incoming record against the stored state of its type.
 *
 * The four output sets are disjoint: a uid lands in exactly one of
 * `toInsert`, `toUpdate` or `unchanged` when present in the batch, and in
 * `toRemove` only when absent from a complete batch and the type's deletion
 * policy allows purging.
 *
 * @throws MalformedSnapshotError when a record lacks its uid or comparison key
 */
export function reconcile(
  definition: EntityDefinition,
  stored: readonly StoredEntry[],
  batch: SnapshotBatch,
): Reconciliation {
  const { latest, anomalies } = dedupeByUid(definition, batch.records)
  const storedByUid = new Map(stored.map((entry) => [entry.uid, entry]))

  const toInsert: SnapshotRecord[] = []
  const toUpdate: SnapshotRecord[] = []
  const unchanged: string[] = []

  for (const record of latest.values()) {
    const key = comparisonKey(definition, record)
    const existing = storedByUid.get(record.uid)
    if (!existing) {
      toInsert.push(record)
    } else if (existing.key === key) {
      unchanged.push(record.uid)
    } else {
      toUpdate.push(record)
    }
  }

  const toRemove = resolveRemovals(
    definition.deletion,
    stored,
    new Set(latest.keys()),
    batch.isComplete,
  )

  return {
    entityType: definition.type,
    toInsert,
    toUpdate,
    unchanged,
    toRemove,
    trashed: [],
    restored: [],
    reordered: [],
    anomalies,
  }
}

export function hasWrites(reconciliation: Reconciliation): boolean {
  return (
    reconciliation.toInsert.length > 0 ||
    reconciliation.toUpdate.length > 0 ||
    reconciliation.toRemove.length > 0
  )
}
