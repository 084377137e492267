import type { DatabaseService } from '@services/database.service.js'
import type { EntityDefinition } from '@root/types/entities.types.js'
import {
  type IntegrityViolation,
  ReferentialIntegrityError,
} from '@root/types/errors.js'
import { findParentCycles } from '@services/mirror-sync/apply/hierarchy.js'
import type { Knex } from 'knex'

interface ForeignKeyCheckRow {
  table: string
  rowid: number | null
  parent: string
  fkid: number
}

interface ForeignKeyListRow {
  id: number
  table: string
  from: string
  to: string
}

interface PgForeignKeyError {
  code: string
  table?: string
  detail?: string
  constraint?: string
}

const FK_DETAIL = /Key \((.+?)\)=\((.*?)\) is not present in table "(.+?)"/

function isPgForeignKeyError(error: unknown): error is PgForeignKeyError {
  return (
    error instanceof Error &&
    'code' in error &&
    error.code === '23503'
  )
}

function rowsOf<T>(result: unknown): T[] {
  // better-sqlite3 returns rows directly, pg wraps them in { rows }
  if (Array.isArray(result)) return result
  if (
    result !== null &&
    typeof result === 'object' &&
    'rows' in result &&
    Array.isArray(result.rows)
  ) {
    return result.rows
  }
  return []
}

/**
 * Switches the open transaction to commit-time foreign key checking.
 */
export async function deferConstraints(
  this: DatabaseService,
  trx: Knex.Transaction,
): Promise<void> {
  if (this.isPostgres) {
    await trx.raw('SET CONSTRAINTS ALL DEFERRED')
  } else {
    await trx.raw('PRAGMA defer_foreign_keys = ON')
  }
}

/**
 * Runs the commit-time foreign key check inside the transaction so a failure
 * rolls it back instead of failing the COMMIT itself.
 *
 * @throws ReferentialIntegrityError listing every dangling reference found
 */
export async function assertReferentialIntegrity(
  this: DatabaseService,
  trx: Knex.Transaction,
): Promise<void> {
  if (this.isPostgres) {
    try {
      await trx.raw('SET CONSTRAINTS ALL IMMEDIATE')
    } catch (error) {
      if (!isPgForeignKeyError(error)) throw error
      const match = error.detail ? FK_DETAIL.exec(error.detail) : null
      throw new ReferentialIntegrityError(
        [
          {
            entityType: error.table ?? 'unknown',
            uid: null,
            column: match?.[1] ?? error.constraint ?? 'unknown',
            referencedType: match?.[3] ?? 'unknown',
            referencedUid: match?.[2] ?? null,
          },
        ],
        { cause: error },
      )
    }
    return
  }

  const failures = rowsOf<ForeignKeyCheckRow>(
    await trx.raw('PRAGMA foreign_key_check'),
  )
  if (failures.length === 0) return

  const keysByTable = new Map<string, Map<number, ForeignKeyListRow>>()
  const violations: IntegrityViolation[] = []

  for (const failure of failures) {
    let keys = keysByTable.get(failure.table)
    if (!keys) {
      const list = rowsOf<ForeignKeyListRow>(
        await trx.raw('SELECT * FROM pragma_foreign_key_list(?)', [
          failure.table,
        ]),
      )
      keys = new Map(list.map((key) => [key.id, key]))
      keysByTable.set(failure.table, keys)
    }

    const key = keys.get(failure.fkid)
    const row: Record<string, unknown> | undefined =
      failure.rowid === null
        ? undefined
        : await trx(failure.table).where('id', failure.rowid).first()
    const referenced = key && row ? row[key.from] : undefined

    violations.push({
      entityType: failure.table,
      uid: typeof row?.uid === 'string' ? row.uid : null,
      column: key?.from ?? 'unknown',
      referencedType: failure.parent,
      referencedUid: typeof referenced === 'string' ? referenced : null,
    })
  }

  throw new ReferentialIntegrityError(violations)
}

/**
 * Cycles in the parent chain of a self-referencing type, read from the
 * current (uncommitted) state of the transaction.
 */
export async function findHierarchyCycles(
  this: DatabaseService,
  trx: Knex.Transaction,
  definition: EntityDefinition,
): Promise<string[][]> {
  const parentColumn = definition.parentColumn
  if (!parentColumn) return []

  const rows: Array<Record<string, unknown>> = await trx(
    definition.table,
  ).select('uid', parentColumn)

  const parents = new Map<string, string | null>()
  for (const row of rows) {
    const parent = row[parentColumn]
    parents.set(String(row.uid), typeof parent === 'string' ? parent : null)
  }
  return findParentCycles(parents)
}
