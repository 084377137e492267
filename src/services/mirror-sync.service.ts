/**
 * Mirror Sync Service
 *
 * Runs synchronization passes that bring the local store in line with the
 * upstream account, one entity type at a time.
 *
 * Per type (concurrently, bounded by `concurrency`):
 * - read the stored position and fetch what changed since (with retry)
 * - reconcile the batch against stored rows
 * - hydrate summary-only records that are about to be written
 * - record soft-delete transitions and inspect collection ordering
 *
 * The touched types are then grouped by reference so that every group
 * commits as one transaction with deferred foreign key checks, along with
 * the new positions of its types.
 *
 * @example
 * const report = await fastify.mirrorSync.run({ types: ['recipe'] })
 */
import type { DatabaseService } from '@services/database.service.js'
import { ENTITY_DEFINITIONS } from '@services/mirror-sync/entities/registry.js'
import { BatchApplier } from '@services/mirror-sync/apply/batch-applier.js'
import { CommitLock } from '@services/mirror-sync/apply/commit-lock.js'
import { groupByDependency } from '@services/mirror-sync/apply/dependency-groups.js'
import { fetchWithRetry } from '@services/mirror-sync/fetching/fetch-with-retry.js'
import { normalizeRow } from '@services/mirror-sync/identity/fingerprint.js'
import { inspectOrdering } from '@services/mirror-sync/ordering/ordering-maintainer.js'
import { ProgressTracker } from '@services/mirror-sync/progress/progress-tracker.js'
import {
  hasWrites,
  reconcile,
} from '@services/mirror-sync/reconciliation/reconciler.js'
import { SyncResultBuilder } from '@services/mirror-sync/result-builder.js'
import { recordTrashTransitions } from '@services/mirror-sync/tombstone/deletion-policy.js'
import type {
  EntityDefinition,
  EntityType,
  SnapshotRecord,
} from '@root/types/entities.types.js'
import {
  isStoreConnectivityError,
  MalformedSnapshotError,
  StoreUnavailableError,
  SyncCancelledError,
  SyncInProgressError,
} from '@root/types/errors.js'
import type {
  ApplyEntry,
  Reconciliation,
  RetryOptions,
  SourceFetchClient,
  SyncAnomaly,
  SyncPassResult,
  SyncRunOptions,
} from '@root/types/mirror-sync.types.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger } from 'fastify'
import pLimit from 'p-limit'

export interface MirrorSyncSettings {
  /** Entity types fetched and reconciled at the same time */
  concurrency: number
  retry: RetryOptions
}

export interface MirrorSyncDeps {
  db: DatabaseService
  source: SourceFetchClient
  settings: MirrorSyncSettings
}

type PrepareOutcome =
  | { kind: 'commit'; entry: ApplyEntry }
  | { kind: 'done' }

export class MirrorSyncService {
  private readonly log: FastifyBaseLogger
  private readonly progress: ProgressTracker
  private readonly applier: BatchApplier

  /**
   * Flag to prevent concurrent passes
   */
  private _running = false
  private _lastResult: SyncPassResult | null = null
  private _pass: Promise<SyncPassResult> | null = null

  constructor(
    readonly baseLog: FastifyBaseLogger,
    private readonly deps: MirrorSyncDeps,
  ) {
    this.log = createServiceLogger(baseLog, 'MIRROR_SYNC')
    this.progress = new ProgressTracker(deps.db)
    this.applier = new BatchApplier({
      db: deps.db,
      progress: this.progress,
      lock: new CommitLock(),
      logger: this.log,
    })
  }

  get isRunning(): boolean {
    return this._running
  }

  /** Report of the most recent completed pass */
  get lastResult(): SyncPassResult | null {
    return this._lastResult
  }

  getPositions(): Promise<
    Record<string, { position: string; updatedAt: string }>
  > {
    return this.progress.getAllPositions()
  }

  /**
   * Runs one pass over the requested types (all registered types by default).
   *
   * @throws SyncInProgressError when another pass is running
   * @throws StoreUnavailableError when the local store cannot be reached
   */
  async run(options: SyncRunOptions = {}): Promise<SyncPassResult> {
    if (this._running) {
      throw new SyncInProgressError()
    }
    this._running = true

    const pass = this.executePass(options)
    this._pass = pass
    try {
      const result = await pass
      this._lastResult = result
      this.logResult(result)
      return result
    } finally {
      this._running = false
      this._pass = null
    }
  }

  /**
   * Resolves once the running pass (if any) has settled. Its outcome is left
   * to the caller of `run()`.
   */
  async waitForIdle(): Promise<void> {
    const pass = this._pass
    if (!pass) return
    await pass.then(
      () => undefined,
      () => undefined,
    )
  }

  private async executePass(options: SyncRunOptions): Promise<SyncPassResult> {
    const requested = options.types ? new Set(options.types) : null
    const definitions = ENTITY_DEFINITIONS.filter(
      (definition) => !requested || requested.has(definition.type),
    )
    const types = definitions.map((definition) => definition.type)
    const result = new SyncResultBuilder(types)

    this.log.info(
      { types, full: options.full === true },
      'Starting mirror sync pass',
    )

    const limit = pLimit(Math.max(1, this.deps.settings.concurrency))
    const prepared = await Promise.allSettled(
      definitions.map((definition) =>
        limit(() => this.prepareType(definition, options, result)),
      ),
    )
    this.rethrowFatal(prepared)

    // Registry order, independent of fetch completion order
    const entries = new Map<EntityType, ApplyEntry>()
    for (const outcome of prepared) {
      if (outcome.status === 'fulfilled' && outcome.value.kind === 'commit') {
        entries.set(outcome.value.entry.definition.type, outcome.value.entry)
      }
    }
    const ordered = types.filter((type) => entries.has(type))

    const committed = await Promise.allSettled(
      groupByDependency(ordered).map((group) =>
        this.commitGroup(
          group.flatMap((type) => entries.get(type) ?? []),
          options.signal,
          result,
        ),
      ),
    )
    this.rethrowFatal(committed)

    const positions = await this.wrapStore(() =>
      this.progress.getAllPositions(),
    )
    return result.build(positions)
  }

  /**
   * Fetch, reconcile and prepare one type. Per-type failures are recorded on
   * the report; only store failures propagate.
   */
  private async prepareType(
    definition: EntityDefinition,
    options: SyncRunOptions,
    result: SyncResultBuilder,
  ): Promise<PrepareOutcome> {
    const type = definition.type
    const { source, db, settings } = this.deps

    if (options.signal?.aborted) {
      result.cancel([type])
      return { kind: 'done' }
    }

    try {
      const current = await this.wrapStore(() =>
        this.progress.getPosition(type),
      )
      const since = options.full ? null : current

      const batch = await fetchWithRetry(() => source.fetch(type, since), {
        ...settings.retry,
        log: this.log,
        label: type,
        signal: options.signal,
      })
      if (batch.entityType !== type) {
        throw new MalformedSnapshotError(
          type,
          null,
          `received a batch for ${batch.entityType}`,
        )
      }

      if (
        batch.records.length === 0 &&
        !batch.isComplete &&
        batch.position === since
      ) {
        this.log.debug({ type, position: since }, 'Entity type is up to date')
        result.upToDate(type)
        return { kind: 'done' }
      }

      const stored = await this.wrapStore(() => db.getStoredEntries(definition))
      const reconciliation = reconcile(definition, stored, batch)
      result.recordAnomalies(reconciliation.anomalies)

      await this.hydrate(definition, reconciliation, options.signal)

      const storedByUid = new Map(stored.map((entry) => [entry.uid, entry]))
      recordTrashTransitions(definition.deletion, storedByUid, reconciliation)

      const ordering = inspectOrdering(definition, stored, reconciliation)
      reconciliation.reordered.push(...ordering.reordered)
      reconciliation.anomalies.push(...ordering.anomalies)
      result.recordAnomalies(ordering.anomalies)

      if (!hasWrites(reconciliation) && batch.position === current) {
        result.upToDate(type, reconciliation)
        return { kind: 'done' }
      }

      this.log.debug(
        {
          type,
          insert: reconciliation.toInsert.length,
          update: reconciliation.toUpdate.length,
          unchanged: reconciliation.unchanged.length,
          remove: reconciliation.toRemove.length,
        },
        'Reconciled entity type',
      )

      return {
        kind: 'commit',
        entry: { definition, reconciliation, position: batch.position },
      }
    } catch (error) {
      if (error instanceof StoreUnavailableError) throw error
      if (error instanceof SyncCancelledError) {
        result.cancel([type])
        return { kind: 'done' }
      }
      this.log.error({ error, type }, 'Failed to prepare entity type')
      result.failed([type], error)
      return { kind: 'done' }
    }
  }

  /**
   * Replaces summary-only records that are about to be written with their
   * full content, then validates every record to be written.
   */
  private async hydrate(
    definition: EntityDefinition,
    reconciliation: Reconciliation,
    signal: AbortSignal | undefined,
  ): Promise<void> {
    const type = definition.type
    const { source, settings } = this.deps
    const pending = [...reconciliation.toInsert, ...reconciliation.toUpdate]
    const summaries = pending.filter((record) => !record.row)

    let hydratedByUid = new Map<string, SnapshotRecord>()
    if (summaries.length > 0) {
      const hydrateRecords = source.hydrate?.bind(source)
      if (!hydrateRecords) {
        throw new MalformedSnapshotError(
          type,
          summaries[0]?.uid ?? null,
          'record has no content and the source cannot hydrate it',
        )
      }
      this.log.debug(
        { type, count: summaries.length },
        'Hydrating summary records',
      )
      const hydrated = await fetchWithRetry(
        () => hydrateRecords(type, summaries),
        { ...settings.retry, log: this.log, label: `${type} details`, signal },
      )
      hydratedByUid = new Map(hydrated.map((record) => [record.uid, record]))
    }

    const complete = (record: SnapshotRecord): SnapshotRecord => {
      const full = record.row ? record : hydratedByUid.get(record.uid)
      if (!full?.row) {
        throw new MalformedSnapshotError(
          type,
          record.uid,
          'hydration returned no content',
        )
      }
      return {
        uid: record.uid,
        fingerprint: full.fingerprint ?? record.fingerprint,
        row: normalizeRow(definition, record.uid, full.row),
        links: full.links ?? record.links,
      }
    }

    reconciliation.toInsert = reconciliation.toInsert.map(complete)
    reconciliation.toUpdate = reconciliation.toUpdate.map(complete)
  }

  private async commitGroup(
    entries: readonly ApplyEntry[],
    signal: AbortSignal | undefined,
    result: SyncResultBuilder,
  ): Promise<void> {
    const types = entries.map((entry) => entry.definition.type)
    if (signal?.aborted) {
      result.cancel(types)
      return
    }

    try {
      const applied = await this.wrapStore(() => this.applier.apply(entries))
      result.applied(entries, applied)
    } catch (error) {
      if (error instanceof StoreUnavailableError) throw error
      this.log.error({ error, types }, 'Failed to commit batch')
      result.failed(types, error)
    }
  }

  /**
   * Runs a store operation, turning connectivity failures into
   * StoreUnavailableError.
   */
  private async wrapStore<T>(operation: () => Promise<T>): Promise<T> {
    try {
      return await operation()
    } catch (error) {
      if (isStoreConnectivityError(error)) {
        throw new StoreUnavailableError('Local store is unavailable', {
          cause: error,
        })
      }
      throw error
    }
  }

  private rethrowFatal(outcomes: readonly PromiseSettledResult<unknown>[]) {
    for (const outcome of outcomes) {
      if (outcome.status === 'rejected') {
        this.log.error({ error: outcome.reason }, 'Mirror sync pass aborted')
        throw outcome.reason
      }
    }
  }

  private logAnomaly(anomaly: SyncAnomaly): void {
    switch (anomaly.kind) {
      case 'duplicate-uid':
        this.log.warn(
          anomaly,
          `Duplicate uid ${anomaly.uid} in ${anomaly.entityType} batch, last occurrence kept`,
        )
        break
      case 'duplicate-position':
        this.log.warn(
          anomaly,
          `Position ${anomaly.position} shared by ${anomaly.uids.length} ${anomaly.entityType} rows`,
        )
        break
      case 'category-cycle':
        this.log.error(
          anomaly,
          `Cycle in ${anomaly.entityType} parent chain: ${anomaly.uids.join(' -> ')}`,
        )
        break
    }
  }

  private logResult(result: SyncPassResult): void {
    for (const anomaly of result.anomalies) {
      this.logAnomaly(anomaly)
    }

    const summary = {
      totals: result.totals,
      failed: result.failures.flatMap((failure) => failure.entityTypes),
      cancelled: result.cancelled,
    }
    if (result.failures.length > 0) {
      this.log.warn(summary, 'Mirror sync pass finished with failures')
    } else {
      this.log.info(summary, 'Mirror sync pass finished')
    }
  }
}
