import type {
  EntityDefinition,
  SnapshotRecord,
  StoredEntry,
} from '@root/types/entities.types.js'
import type { Knex } from 'knex'

declare module '../../database.service.js' {
  interface DatabaseService {
    // MIRRORED ENTITIES
    /**
     * Stored state of every row of a type, ordered by surrogate key
     */
    getStoredEntries(
      definition: EntityDefinition,
      trx?: Knex.Transaction,
    ): Promise<StoredEntry[]>

    /**
     * Inserts new rows in chunks of 100
     * @returns Number of rows inserted
     */
    insertEntities(
      trx: Knex.Transaction,
      definition: EntityDefinition,
      records: readonly SnapshotRecord[],
    ): Promise<number>

    /**
     * Updates existing rows by uid
     * @returns Number of rows updated
     */
    updateEntities(
      trx: Knex.Transaction,
      definition: EntityDefinition,
      records: readonly SnapshotRecord[],
    ): Promise<number>

    /**
     * Deletes rows by uid together with their junction rows
     * @returns Number of rows deleted
     */
    deleteEntities(
      trx: Knex.Transaction,
      definition: EntityDefinition,
      uids: readonly string[],
    ): Promise<number>

    /**
     * Rewrites junction rows for every record carrying link data
     */
    replaceLinks(
      trx: Knex.Transaction,
      definition: EntityDefinition,
      records: readonly SnapshotRecord[],
    ): Promise<void>
  }
}
