import type { DatabaseService } from '@services/database.service.js'
import type {
  CollectionMember,
  EntityDefinition,
} from '@root/types/entities.types.js'
import {
  normalizeRow,
  normalizeValue,
} from '@services/mirror-sync/identity/fingerprint.js'

/**
 * Members of one collection in position order, ties broken by surrogate key.
 *
 * `scope` holds the value of each scope column to filter on; a column left
 * out is not filtered and null matches rows where the column is null. Types
 * without ordering are listed by surrogate key.
 */
export async function listCollection(
  this: DatabaseService,
  definition: EntityDefinition,
  scope: Readonly<Record<string, string | null>> = {},
): Promise<CollectionMember[]> {
  const ordering = definition.ordering
  const query = this.knex(definition.table).select('*')

  for (const name of ordering?.scope ?? []) {
    if (!(name in scope)) continue
    const value = scope[name]
    if (value === null || value === undefined) {
      query.whereNull(name)
      continue
    }
    const column = definition.columns.find((c) => c.name === name)
    // Timestamps are matched on their normalized form
    const normalized =
      column?.kind === 'timestamp' ? normalizeValue(column, value) : value
    query.where(name, normalized ?? value)
  }

  if (ordering) {
    query.orderBy([{ column: ordering.column }, { column: 'id' }])
  } else {
    query.orderBy('id')
  }

  const rows: Array<Record<string, unknown>> = await query

  return rows.map((row) => {
    const uid = String(row.uid)
    const position = ordering
      ? normalizeValue(
          { name: ordering.column, kind: 'integer', nullable: true },
          row[ordering.column],
        )
      : null
    return {
      id: Number(row.id),
      uid,
      position: typeof position === 'number' ? position : null,
      row: normalizeRow(definition, uid, row),
    }
  })
}
