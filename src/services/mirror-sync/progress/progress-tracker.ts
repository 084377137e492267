import type { DatabaseService } from '@services/database.service.js'
import type { EntityType } from '@root/types/entities.types.js'
import type { Knex } from 'knex'

/**
 * Durable per-type sync position. Positions are opaque: whatever the source
 * handed out is stored and handed back verbatim.
 */
export class ProgressTracker {
  constructor(private readonly db: DatabaseService) {}

  /** Null when the type was never synced */
  getPosition(entityType: EntityType): Promise<string | null> {
    return this.db.getSyncPosition(entityType)
  }

  /**
   * Records the position inside the batch transaction; it becomes visible
   * only if the batch commits.
   */
  setPosition(
    trx: Knex.Transaction,
    entityType: EntityType,
    position: string,
  ): Promise<void> {
    return this.db.setSyncPosition(trx, entityType, position)
  }

  getAllPositions(): Promise<
    Record<string, { position: string; updatedAt: string }>
  > {
    return this.db.getSyncPositions()
  }
}
