import type { EntityDefinition } from '@root/types/entities.types.js'
import type { Knex } from 'knex'

declare module '../../database.service.js' {
  interface DatabaseService {
    // INTEGRITY
    /**
     * Defers foreign key checks to commit time for the open transaction
     */
    deferConstraints(trx: Knex.Transaction): Promise<void>

    /**
     * Checks every foreign key before commit
     * @throws ReferentialIntegrityError when a reference does not resolve
     */
    assertReferentialIntegrity(trx: Knex.Transaction): Promise<void>

    /**
     * Cycles in the parent chain of a self-referencing type
     */
    findHierarchyCycles(
      trx: Knex.Transaction,
      definition: EntityDefinition,
    ): Promise<string[][]>
  }
}
