import type {
  EntityDefinition,
  EntityType,
  SnapshotBatch,
  SnapshotRecord,
} from './entities.types.js'
import type { IntegrityViolation } from './errors.js'

/**
 * Contract of the external source. `sincePosition` is the last committed
 * position for the type, or null when the type was never synced.
 */
export interface SourceFetchClient {
  fetch(
    entityType: EntityType,
    sincePosition: string | null,
  ): Promise<SnapshotBatch>
  /**
   * Fills in `row` (and `links`) for summary-only records. Only called for
   * records that are about to be written.
   */
  hydrate?(
    entityType: EntityType,
    records: readonly SnapshotRecord[],
  ): Promise<SnapshotRecord[]>
}

export type SyncAnomaly =
  | {
      kind: 'duplicate-uid'
      entityType: EntityType
      uid: string
      occurrences: number
    }
  | {
      kind: 'duplicate-position'
      entityType: EntityType
      scope: string | null
      position: number
      /** Tie-break order: stored rows by surrogate key, then new rows in batch order */
      uids: string[]
    }
  | {
      kind: 'category-cycle'
      entityType: EntityType
      uids: string[]
    }

export interface Reconciliation {
  entityType: EntityType
  toInsert: SnapshotRecord[]
  toUpdate: SnapshotRecord[]
  unchanged: string[]
  toRemove: string[]
  /** Rows whose soft-delete flag goes from unset to set */
  trashed: string[]
  /** Rows whose soft-delete flag goes from set to unset */
  restored: string[]
  /** Rows whose ordering position or scope changes */
  reordered: string[]
  anomalies: SyncAnomaly[]
}

export interface ApplyEntry {
  definition: EntityDefinition
  reconciliation: Reconciliation
  /** Position to store with the batch; null leaves it untouched */
  position: string | null
}

export interface ApplyResult {
  entityTypes: EntityType[]
  inserted: number
  updated: number
  removed: number
  anomalies: SyncAnomaly[]
}

export interface SyncCounts {
  added: number
  changed: number
  removed: number
  unchanged: number
  trashed: number
  restored: number
  reordered: number
}

export type EntitySyncStatus = 'up-to-date' | 'applied' | 'failed' | 'cancelled'

export interface EntitySyncOutcome {
  entityType: EntityType
  status: EntitySyncStatus
  /** Stored position after the pass */
  position: string | null
  counts: SyncCounts
  error?: string
}

export type SyncFailureKind = 'fetch' | 'malformed' | 'integrity' | 'unknown'

export interface SyncFailure {
  kind: SyncFailureKind
  entityTypes: EntityType[]
  message: string
  violations?: IntegrityViolation[]
}

export interface SyncPassResult {
  startedAt: string
  finishedAt: string
  cancelled: boolean
  hadChanges: boolean
  totals: SyncCounts
  entities: EntitySyncOutcome[]
  anomalies: SyncAnomaly[]
  failures: SyncFailure[]
}

export interface SyncRunOptions {
  /** Restrict the pass to these types; defaults to every registered type */
  types?: readonly EntityType[]
  /** Ignore stored positions and request complete snapshots */
  full?: boolean
  signal?: AbortSignal
}

export interface RetryOptions {
  maxRetries: number
  baseDelayMs: number
  maxDelayMs: number
}
