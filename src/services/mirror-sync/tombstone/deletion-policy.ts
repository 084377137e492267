import type {
  DeletionPolicy,
  StoredEntry,
  SnapshotRecord,
} from '@root/types/entities.types.js'
import type { Reconciliation } from '@root/types/mirror-sync.types.js'

/**
 * Column carrying the soft-delete flag, or null for omission-only types.
 */
export function trashColumn(policy: DeletionPolicy): string | null {
  switch (policy.kind) {
    case 'explicit-flag':
    case 'both':
      return policy.column
    case 'implicit-omission':
      return null
  }
}

/**
 * Uids to purge for the batch. Only a complete snapshot can prove absence,
 * and flag-only types are never purged. Under `both`, a flagged row that
 * later vanishes from a complete snapshot is purged like any other.
 */
export function resolveRemovals(
  policy: DeletionPolicy,
  stored: readonly StoredEntry[],
  incomingUids: ReadonlySet<string>,
  isComplete: boolean,
): string[] {
  if (!isComplete || policy.kind === 'explicit-flag') {
    return []
  }
  return stored
    .filter((entry) => !incomingUids.has(entry.uid))
    .map((entry) => entry.uid)
}

export type TrashTransition = 'trashed' | 'restored'

/**
 * Reports whether writing `record` over `stored` flips the soft-delete flag.
 * New rows have no transition, whatever their flag.
 */
export function classifyTrash(
  policy: DeletionPolicy,
  stored: StoredEntry | undefined,
  record: SnapshotRecord,
): TrashTransition | null {
  const column = trashColumn(policy)
  if (!column || !stored || !record.row) return null

  const flagged = record.row[column] === true
  if (flagged && !stored.trashed) return 'trashed'
  if (!flagged && stored.trashed) return 'restored'
  return null
}

/**
 * Fills `trashed` and `restored` on a reconciliation whose updated records
 * carry their content.
 */
export function recordTrashTransitions(
  policy: DeletionPolicy,
  storedByUid: ReadonlyMap<string, StoredEntry>,
  reconciliation: Reconciliation,
): void {
  for (const record of reconciliation.toUpdate) {
    const transition = classifyTrash(
      policy,
      storedByUid.get(record.uid),
      record,
    )
    if (transition === 'trashed') reconciliation.trashed.push(record.uid)
    if (transition === 'restored') reconciliation.restored.push(record.uid)
  }
}
