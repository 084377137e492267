import type { DatabaseService } from '@services/database.service.js'
import type { EntityType } from '@root/types/entities.types.js'
import type { Knex } from 'knex'

interface SyncStatusRow {
  name: string
  position: string
  updated_at: string | Date
}

/**
 * Last committed position for an entity type, or null if it was never synced.
 */
export async function getSyncPosition(
  this: DatabaseService,
  entityType: EntityType,
  trx?: Knex.Transaction,
): Promise<string | null> {
  const query = trx || this.knex
  const row: SyncStatusRow | undefined = await query('sync_status')
    .where({ name: entityType })
    .first()
  return row ? row.position : null
}

/**
 * Every stored position keyed by entity type name.
 */
export async function getSyncPositions(
  this: DatabaseService,
): Promise<Record<string, { position: string; updatedAt: string }>> {
  const rows: SyncStatusRow[] = await this.knex('sync_status')
    .select('name', 'position', 'updated_at')
    .orderBy('name')

  const positions: Record<string, { position: string; updatedAt: string }> =
    {}
  for (const row of rows) {
    positions[row.name] = {
      position: row.position,
      updatedAt: new Date(row.updated_at).toISOString(),
    }
  }
  return positions
}

/**
 * Upserts the position of an entity type. Takes the batch transaction so the
 * position commits or rolls back together with the data it gates.
 */
export async function setSyncPosition(
  this: DatabaseService,
  trx: Knex.Transaction,
  entityType: EntityType,
  position: string,
): Promise<void> {
  await trx('sync_status')
    .insert({
      name: entityType,
      position,
      updated_at: this.timestamp,
    })
    .onConflict('name')
    .merge(['position', 'updated_at'])
}
