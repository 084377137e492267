/**
 * PostgreSQL configuration utilities
 *
 * Timestamps come back as the server's text form so that both drivers hand
 * the normalizer a string and stored digests compare equal across stores.
 */
import type { FastifyBaseLogger } from 'fastify'

// Track if type parsers have been configured to prevent duplicate setup
let pgTypesConfigured = false

const TEXT_TYPE_OIDS = {
  date: 1082,
  timestamp: 1114,
  timestamptz: 1184,
} as const

/**
 * Configure PostgreSQL type parsers to return dates and timestamps as strings
 *
 * @param log - Fastify logger instance for logging configuration status
 */
export async function configurePgTypes(log: FastifyBaseLogger): Promise<void> {
  if (pgTypesConfigured) return

  const pg = await import('pg')
  const { types } = pg.default
  for (const oid of Object.values(TEXT_TYPE_OIDS)) {
    types.setTypeParser(oid, (value: string) => value)
  }

  pgTypesConfigured = true
  log.debug('PostgreSQL type parsers configured successfully')
}
