import type { EntityType } from '@root/types/entities.types.js'
import type { Knex } from 'knex'

declare module '../../database.service.js' {
  interface DatabaseService {
    // SYNC STATUS
    /**
     * Last committed position for an entity type, or null if never synced
     */
    getSyncPosition(
      entityType: EntityType,
      trx?: Knex.Transaction,
    ): Promise<string | null>

    /**
     * Every stored position keyed by entity type name
     */
    getSyncPositions(): Promise<
      Record<string, { position: string; updatedAt: string }>
    >

    /**
     * Upserts a position inside the batch transaction
     */
    setSyncPosition(
      trx: Knex.Transaction,
      entityType: EntityType,
      position: string,
    ): Promise<void>
  }
}
