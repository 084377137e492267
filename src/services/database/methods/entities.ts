import type { DatabaseService } from '@services/database.service.js'
import type {
  ColumnValue,
  EntityDefinition,
  SnapshotRecord,
  StoredEntry,
} from '@root/types/entities.types.js'
import { MalformedSnapshotError } from '@root/types/errors.js'
import {
  normalizeValue,
  scopeKey,
  storedComparisonKey,
} from '@services/mirror-sync/identity/fingerprint.js'
import { trashColumn } from '@services/mirror-sync/tombstone/deletion-policy.js'
import type { Knex } from 'knex'

const CHUNK_SIZE = 100

function chunk<T>(items: readonly T[], size = CHUNK_SIZE): T[][] {
  const chunks: T[][] = []
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size))
  }
  return chunks
}

/**
 * Columns needed to rebuild stored entries. Fingerprinted types skip their
 * content and load only the fingerprint.
 */
function storedEntryColumns(definition: EntityDefinition): string[] {
  const columns = new Set<string>(['id', 'uid'])
  if (definition.fingerprintColumn) {
    columns.add(definition.fingerprintColumn)
  } else {
    for (const column of definition.columns) columns.add(column.name)
  }
  const flag = trashColumn(definition.deletion)
  if (flag) columns.add(flag)
  if (definition.ordering) {
    columns.add(definition.ordering.column)
    for (const name of definition.ordering.scope) columns.add(name)
  }
  return [...columns]
}

/**
 * Database values for a record: uid plus every content column.
 */
function toDbRow(
  definition: EntityDefinition,
  record: SnapshotRecord,
): Record<string, ColumnValue> {
  const row = record.row
  if (!row) {
    throw new MalformedSnapshotError(
      definition.type,
      record.uid,
      'record has no content to write',
    )
  }
  const values: Record<string, ColumnValue> = { uid: record.uid }
  for (const column of definition.columns) {
    values[column.name] = row[column.name] ?? null
  }
  return values
}

/**
 * Loads the stored state of every row of a type as reconciler entries.
 */
export async function getStoredEntries(
  this: DatabaseService,
  definition: EntityDefinition,
  trx?: Knex.Transaction,
): Promise<StoredEntry[]> {
  const query = trx || this.knex
  const rows: Array<Record<string, unknown>> = await query(definition.table)
    .select(storedEntryColumns(definition))
    .orderBy('id')

  const flag = trashColumn(definition.deletion)
  const ordering = definition.ordering

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
      key: storedComparisonKey(definition, uid, row),
      trashed: flag
        ? normalizeValue({ name: flag, kind: 'boolean' }, row[flag]) === true
        : false,
      scope: scopeKey(definition, row),
      position: typeof position === 'number' ? position : null,
    }
  })
}

/**
 * Inserts new rows in chunks. Surrogate ids are assigned by the store.
 */
export async function insertEntities(
  this: DatabaseService,
  trx: Knex.Transaction,
  definition: EntityDefinition,
  records: readonly SnapshotRecord[],
): Promise<number> {
  let inserted = 0
  for (const batch of chunk(records)) {
    await trx(definition.table).insert(
      batch.map((record) => toDbRow(definition, record)),
    )
    inserted += batch.length
  }
  return inserted
}

/**
 * Rewrites the content of existing rows in place. Surrogate ids never change.
 */
export async function updateEntities(
  this: DatabaseService,
  trx: Knex.Transaction,
  definition: EntityDefinition,
  records: readonly SnapshotRecord[],
): Promise<number> {
  let updated = 0
  for (const record of records) {
    const { uid, ...values } = toDbRow(definition, record)
    updated += await trx(definition.table).where({ uid }).update(values)
  }
  return updated
}

/**
 * Deletes rows by uid, after their junction rows.
 */
export async function deleteEntities(
  this: DatabaseService,
  trx: Knex.Transaction,
  definition: EntityDefinition,
  uids: readonly string[],
): Promise<number> {
  let deleted = 0
  for (const batch of chunk(uids)) {
    for (const link of definition.links) {
      await trx(link.table).whereIn(link.ownerColumn, batch).delete()
    }
    deleted += await trx(definition.table).whereIn('uid', batch).delete()
  }
  return deleted
}

/**
 * Replaces the junction rows of every written owner with the set carried by
 * the record. Records without link data keep their existing associations.
 */
export async function replaceLinks(
  this: DatabaseService,
  trx: Knex.Transaction,
  definition: EntityDefinition,
  records: readonly SnapshotRecord[],
): Promise<void> {
  for (const link of definition.links) {
    const owners = records.filter((record) => record.links?.[link.name])
    if (owners.length === 0) continue

    for (const batch of chunk(owners.map((record) => record.uid))) {
      await trx(link.table).whereIn(link.ownerColumn, batch).delete()
    }

    const rows = owners.flatMap((record) =>
      [...new Set(record.links?.[link.name] ?? [])].map((target) => ({
        [link.ownerColumn]: record.uid,
        [link.targetColumn]: target,
      })),
    )
    for (const batch of chunk(rows)) {
      await trx(link.table).insert(batch)
    }
  }
}
