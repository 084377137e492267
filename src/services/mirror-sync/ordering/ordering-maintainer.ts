import type {
  EntityDefinition,
  SnapshotRecord,
  StoredEntry,
} from '@root/types/entities.types.js'
import type {
  Reconciliation,
  SyncAnomaly,
} from '@root/types/mirror-sync.types.js'
import { normalizeValue, scopeKey } from '../identity/fingerprint.js'

interface Member {
  uid: string
  position: number | null
}

export interface OrderingInspection {
  reordered: string[]
  anomalies: SyncAnomaly[]
}

function recordPosition(
  definition: EntityDefinition,
  record: SnapshotRecord,
): number | null {
  const ordering = definition.ordering
  if (!ordering || !record.row) return null
  const value = normalizeValue(
    { name: ordering.column, kind: 'integer', nullable: true },
    record.row[ordering.column],
  )
  return typeof value === 'number' ? value : null
}

/**
 * Computes the membership of every collection the reconciliation touches as
 * it will stand after commit, and reports positions held by more than one
 * member plus the uids whose position or collection changes.
 *
 * Positions are only ever the source's; nothing is renumbered here. Members
 * sharing a position are listed in tie-break order: stored rows by surrogate
 * key, then new rows in batch order.
 */
export function inspectOrdering(
  definition: EntityDefinition,
  stored: readonly StoredEntry[],
  reconciliation: Reconciliation,
): OrderingInspection {
  if (!definition.ordering) {
    return { reordered: [], anomalies: [] }
  }

  const updatedByUid = new Map(
    reconciliation.toUpdate.map((record) => [record.uid, record]),
  )
  const removed = new Set(reconciliation.toRemove)
  const touchedScopes = new Set<string | null>()
  const reordered: string[] = []

  // Post-commit membership, keyed by scope, already in tie-break order
  const collections = new Map<string | null, Member[]>()
  const addMember = (scope: string | null, member: Member) => {
    const members = collections.get(scope)
    if (members) {
      members.push(member)
    } else {
      collections.set(scope, [member])
    }
  }

  const byId = [...stored].sort((a, b) => a.id - b.id)
  for (const entry of byId) {
    if (removed.has(entry.uid)) {
      touchedScopes.add(entry.scope)
      continue
    }

    const update = updatedByUid.get(entry.uid)
    if (!update?.row) {
      addMember(entry.scope, { uid: entry.uid, position: entry.position })
      continue
    }

    const scope = scopeKey(definition, update.row)
    const position = recordPosition(definition, update)
    if (scope !== entry.scope || position !== entry.position) {
      reordered.push(entry.uid)
      touchedScopes.add(entry.scope)
    }
    touchedScopes.add(scope)
    addMember(scope, { uid: entry.uid, position })
  }

  for (const record of reconciliation.toInsert) {
    if (!record.row) continue
    const scope = scopeKey(definition, record.row)
    touchedScopes.add(scope)
    addMember(scope, {
      uid: record.uid,
      position: recordPosition(definition, record),
    })
  }

  const anomalies: SyncAnomaly[] = []
  for (const scope of touchedScopes) {
    const members = collections.get(scope) ?? []
    const byPosition = new Map<number, string[]>()
    for (const member of members) {
      if (member.position === null) continue
      const uids = byPosition.get(member.position)
      if (uids) {
        uids.push(member.uid)
      } else {
        byPosition.set(member.position, [member.uid])
      }
    }
    for (const [position, uids] of byPosition) {
      if (uids.length > 1) {
        anomalies.push({
          kind: 'duplicate-position',
          entityType: definition.type,
          scope,
          position,
          uids,
        })
      }
    }
  }

  return { reordered, anomalies }
}
