import fs from 'node:fs'
import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'
import dotenv from 'dotenv'
import type { Knex } from 'knex'

const __filename = fileURLToPath(import.meta.url)
const __dirname = dirname(__filename)
const projectRoot = resolve(__dirname, '..')

// Load environment variables before anything else
dotenv.config({ path: resolve(projectRoot, '.env') })

function ensureDbDirectory() {
  const dbDirectory = resolve(projectRoot, 'data', 'db')
  try {
    if (!fs.existsSync(dbDirectory)) {
      fs.mkdirSync(dbDirectory, { recursive: true })
    }
    return dbDirectory
  } catch (err) {
    console.error('Failed to create database directory:', err)
    process.exit(1)
  }
}

const dbType = process.env.dbType || 'sqlite'
const isPostgres = dbType === 'postgres'

const getPostgresConnection = (): string | Knex.PgConnectionConfig => {
  if (process.env.dbConnectionString) {
    return process.env.dbConnectionString
  }

  const port = Number.parseInt(process.env.dbPort || '5432', 10)
  if (Number.isNaN(port) || port < 1 || port > 65535) {
    throw new Error('Invalid database port number')
  }

  return {
    host: process.env.dbHost || 'localhost',
    port,
    user: process.env.dbUser || 'postgres',
    password: process.env.dbPassword || undefined,
    database: process.env.dbName || 'recipe_mirror',
  }
}

const getSqliteConnection = () => ({
  filename:
    process.env.dbPath || resolve(ensureDbDirectory(), 'recipe-mirror.db'),
})

interface SqliteConnection {
  pragma(source: string): unknown
}

const config: Record<string, Knex.Config> = {
  development: {
    client: isPostgres ? 'pg' : 'better-sqlite3',
    connection: isPostgres ? getPostgresConnection() : getSqliteConnection(),
    useNullAsDefault: !isPostgres,
    migrations: {
      directory: resolve(__dirname, 'migrations'),
    },
    pool: isPostgres
      ? { min: 2, max: 10 }
      : {
          afterCreate: (
            conn: SqliteConnection,
            cb: (err: Error | null, conn: SqliteConnection) => void,
          ) => {
            conn.pragma('journal_mode = WAL')
            conn.pragma('foreign_keys = ON')
            cb(null, conn)
          },
        },
  },
}

export default config
