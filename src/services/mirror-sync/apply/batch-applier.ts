import type { DatabaseService } from '@services/database.service.js'
import type {
  ApplyEntry,
  ApplyResult,
  SyncAnomaly,
} from '@root/types/mirror-sync.types.js'
import type { FastifyBaseLogger } from 'fastify'
import type { ProgressTracker } from '../progress/progress-tracker.js'
import type { CommitLock } from './commit-lock.js'

export interface BatchApplierDeps {
  db: DatabaseService
  progress: ProgressTracker
  lock: CommitLock
  logger: FastifyBaseLogger
}

/**
 * Commits reconciled deltas for one or more entity types as a single
 * transaction with foreign key checks deferred to the end, so rows may be
 * written in any order across types.
 *
 * Inside the transaction: every insert, update and junction rewrite, then
 * every removal, then every position. The integrity check runs last; on
 * failure the whole batch rolls back and no position moves.
 */
export class BatchApplier {
  constructor(private readonly deps: BatchApplierDeps) {}

  /**
   * @throws ReferentialIntegrityError when a reference does not resolve
   */
  async apply(entries: readonly ApplyEntry[]): Promise<ApplyResult> {
    const types = entries.map((entry) => entry.definition.type)
    return this.deps.lock.run(types, () => this.commit(entries))
  }

  private async commit(entries: readonly ApplyEntry[]): Promise<ApplyResult> {
    const { db, progress, logger } = this.deps
    const entityTypes = entries.map((entry) => entry.definition.type)

    return db.knex.transaction(async (trx) => {
      await db.deferConstraints(trx)

      let inserted = 0
      let updated = 0
      let removed = 0

      for (const { definition, reconciliation } of entries) {
        inserted += await db.insertEntities(
          trx,
          definition,
          reconciliation.toInsert,
        )
        updated += await db.updateEntities(
          trx,
          definition,
          reconciliation.toUpdate,
        )
        await db.replaceLinks(trx, definition, [
          ...reconciliation.toInsert,
          ...reconciliation.toUpdate,
        ])
      }

      for (const { definition, reconciliation } of entries) {
        removed += await db.deleteEntities(
          trx,
          definition,
          reconciliation.toRemove,
        )
      }

      for (const { definition, position } of entries) {
        if (position !== null) {
          await progress.setPosition(trx, definition.type, position)
        }
      }

      await db.assertReferentialIntegrity(trx)

      const anomalies: SyncAnomaly[] = []
      for (const { definition, reconciliation } of entries) {
        const written =
          reconciliation.toInsert.length + reconciliation.toUpdate.length
        if (!definition.parentColumn || written === 0) continue

        for (const uids of await db.findHierarchyCycles(trx, definition)) {
          anomalies.push({
            kind: 'category-cycle',
            entityType: definition.type,
            uids,
          })
        }
      }

      logger.debug(
        { entityTypes, inserted, updated, removed },
        'Batch applied',
      )

      return { entityTypes, inserted, updated, removed, anomalies }
    })
  }
}
