import type { EntityType } from '@root/types/entities.types.js'
import {
  MalformedSnapshotError,
  ReferentialIntegrityError,
  UpstreamRequestError,
} from '@root/types/errors.js'
import type {
  ApplyEntry,
  ApplyResult,
  EntitySyncOutcome,
  EntitySyncStatus,
  Reconciliation,
  SyncAnomaly,
  SyncCounts,
  SyncFailure,
  SyncFailureKind,
  SyncPassResult,
} from '@root/types/mirror-sync.types.js'

export function emptyCounts(): SyncCounts {
  return {
    added: 0,
    changed: 0,
    removed: 0,
    unchanged: 0,
    trashed: 0,
    restored: 0,
    reordered: 0,
  }
}

export function countsOf(reconciliation: Reconciliation): SyncCounts {
  return {
    added: reconciliation.toInsert.length,
    changed: reconciliation.toUpdate.length,
    removed: reconciliation.toRemove.length,
    unchanged: reconciliation.unchanged.length,
    trashed: reconciliation.trashed.length,
    restored: reconciliation.restored.length,
    reordered: reconciliation.reordered.length,
  }
}

function addCounts(target: SyncCounts, source: SyncCounts): void {
  target.added += source.added
  target.changed += source.changed
  target.removed += source.removed
  target.unchanged += source.unchanged
  target.trashed += source.trashed
  target.restored += source.restored
  target.reordered += source.reordered
}

export function classifyFailure(error: unknown): SyncFailureKind {
  if (error instanceof UpstreamRequestError) return 'fetch'
  if (error instanceof MalformedSnapshotError) return 'malformed'
  if (error instanceof ReferentialIntegrityError) return 'integrity'
  return 'unknown'
}

/**
 * Accumulates per-type outcomes of one pass into its report. Types that
 * never reach a terminal state are reported as cancelled.
 */
export class SyncResultBuilder {
  private readonly outcomes = new Map<EntityType, EntitySyncOutcome>()
  private readonly anomalies: SyncAnomaly[] = []
  private readonly failures: SyncFailure[] = []
  private cancelled = false

  constructor(
    private readonly types: readonly EntityType[],
    private readonly startedAt: Date = new Date(),
  ) {}

  private set(
    entityType: EntityType,
    status: EntitySyncStatus,
    counts: SyncCounts = emptyCounts(),
    error?: string,
  ): void {
    this.outcomes.set(entityType, {
      entityType,
      status,
      position: null,
      counts,
      ...(error ? { error } : {}),
    })
  }

  recordAnomalies(anomalies: readonly SyncAnomaly[]): void {
    this.anomalies.push(...anomalies)
  }

  upToDate(entityType: EntityType, reconciliation?: Reconciliation): void {
    this.set(
      entityType,
      'up-to-date',
      reconciliation ? countsOf(reconciliation) : emptyCounts(),
    )
  }

  applied(entries: readonly ApplyEntry[], result: ApplyResult): void {
    for (const { definition, reconciliation } of entries) {
      this.set(definition.type, 'applied', countsOf(reconciliation))
    }
    this.recordAnomalies(result.anomalies)
  }

  failed(entityTypes: readonly EntityType[], error: unknown): void {
    const message = error instanceof Error ? error.message : String(error)
    for (const entityType of entityTypes) {
      this.set(entityType, 'failed', emptyCounts(), message)
    }
    this.failures.push({
      kind: classifyFailure(error),
      entityTypes: [...entityTypes],
      message,
      ...(error instanceof ReferentialIntegrityError
        ? { violations: [...error.violations] }
        : {}),
    })
  }

  cancel(entityTypes: readonly EntityType[]): void {
    this.cancelled = true
    for (const entityType of entityTypes) {
      this.set(entityType, 'cancelled')
    }
  }

  build(positions: Readonly<Record<string, { position: string }>>): SyncPassResult {
    const totals = emptyCounts()
    const entities = this.types.map((entityType): EntitySyncOutcome => {
      const outcome = this.outcomes.get(entityType) ?? {
        entityType,
        status: 'cancelled',
        position: null,
        counts: emptyCounts(),
      }
      if (outcome.status === 'cancelled') this.cancelled = true
      if (outcome.status === 'applied' || outcome.status === 'up-to-date') {
        addCounts(totals, outcome.counts)
      }
      return { ...outcome, position: positions[entityType]?.position ?? null }
    })

    return {
      startedAt: this.startedAt.toISOString(),
      finishedAt: new Date().toISOString(),
      cancelled: this.cancelled,
      hadChanges: totals.added + totals.changed + totals.removed > 0,
      totals,
      entities,
      anomalies: [...this.anomalies],
      failures: [...this.failures],
    }
  }
}
