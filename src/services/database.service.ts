/**
 * Database Service
 *
 * Owns the knex connection to the local mirror (better-sqlite3 by default,
 * PostgreSQL when `dbType` is `postgres`) and runs migrations on startup.
 * Exposed to the application through the `database` plugin as `fastify.db`.
 *
 * Query methods live in `database/methods/*` and are mixed into the
 * prototype below; their signatures are declared in `database/types/*`.
 *
 * @example
 * const position = await fastify.db.getSyncPosition('recipe')
 */
import fs from 'node:fs'
import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'
import type { FastifyBaseLogger } from 'fastify'
import knex, { type Knex } from 'knex'
import type { DatabaseConfig } from '@root/types/config.types.js'
import { configurePgTypes } from '@utils/postgres-config.js'
import * as collectionMethods from './database/methods/collections.js'
import * as entityMethods from './database/methods/entities.js'
import * as integrityMethods from './database/methods/integrity.js'
import * as syncStatusMethods from './database/methods/sync-status.js'

const __dirname = dirname(fileURLToPath(import.meta.url))

// src/services → project root (dist/src/services → dist once built)
export const MIGRATIONS_DIR = resolve(
  __dirname,
  '..',
  '..',
  'migrations',
  'migrations',
)

interface SqliteConnection {
  pragma(source: string): unknown
}

export class DatabaseService {
  public readonly knex: Knex
  public readonly isPostgres: boolean

  /**
   * @param log - Logger used for query warnings and method failures
   * @param config - Connection settings from the `config` plugin
   */
  constructor(
    public readonly log: FastifyBaseLogger,
    config: DatabaseConfig,
  ) {
    this.isPostgres = config.dbType === 'postgres'
    this.knex = knex(DatabaseService.createKnexConfig(config, log))
  }

  /**
   * Connects, configures the driver and brings the schema up to date.
   */
  static async create(
    log: FastifyBaseLogger,
    config: DatabaseConfig,
  ): Promise<DatabaseService> {
    if (config.dbType === 'postgres') {
      await configurePgTypes(log)
    } else {
      fs.mkdirSync(dirname(resolve(config.dbPath)), { recursive: true })
    }

    const service = new DatabaseService(log, config)
    try {
      await service.runMigrations()
    } catch (error) {
      await service.close()
      throw error
    }
    return service
  }

  /**
   * Knex settings for either client. SQLite runs a single connection with
   * WAL and foreign key enforcement switched on for every new connection.
   */
  static createKnexConfig(
    config: DatabaseConfig,
    log: FastifyBaseLogger,
  ): Knex.Config {
    const logOptions = {
      warn: (message: string) => log.warn(message),
      error: (message: string | Error) => {
        log.error(message instanceof Error ? message.message : message)
      },
      debug: (message: string) => log.debug(message),
    }

    if (config.dbType === 'postgres') {
      return {
        client: 'pg',
        connection: config.dbConnectionString
          ? config.dbConnectionString
          : {
              host: config.dbHost,
              port: config.dbPort,
              user: config.dbUser,
              password: config.dbPassword,
              database: config.dbName,
            },
        pool: { min: 2, max: 10 },
        log: logOptions,
      }
    }

    return {
      client: 'better-sqlite3',
      connection: {
        filename: config.dbPath,
      },
      useNullAsDefault: true,
      pool: {
        min: 1,
        max: 1,
        afterCreate: (
          conn: SqliteConnection,
          done: (err: Error | null, conn: SqliteConnection) => void,
        ) => {
          conn.pragma('journal_mode = WAL')
          conn.pragma('foreign_keys = ON')
          done(null, conn)
        },
      },
      log: logOptions,
    }
  }

  async runMigrations(): Promise<void> {
    const [batch, applied]: [number, string[]] =
      await this.knex.migrate.latest({ directory: MIGRATIONS_DIR })
    if (applied.length > 0) {
      this.log.info(
        { batch, migrations: applied },
        `Applied ${applied.length} database migration(s)`,
      )
    }
  }

  /**
   * Round trip used by the health check.
   */
  async ping(): Promise<boolean> {
    try {
      await this.knex.raw('SELECT 1')
      return true
    } catch (error) {
      this.log.warn({ error }, 'Database ping failed')
      return false
    }
  }

  get timestamp(): string {
    return new Date().toISOString()
  }

  async close(): Promise<void> {
    await this.knex.destroy()
  }
}

Object.assign(
  DatabaseService.prototype,
  syncStatusMethods,
  entityMethods,
  collectionMethods,
  integrityMethods,
)
