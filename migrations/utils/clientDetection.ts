import type { Knex } from 'knex'

export const POSTGRESQL_CLIENT = 'pg' as const

/**
 * Whether the migration runs against PostgreSQL. Deferrable constraints
 * only exist there; SQLite defers per transaction instead.
 */
export function isPostgreSQL(knex: Knex): boolean {
  const client: unknown = knex.client.config?.client
  return client === POSTGRESQL_CLIENT
}
