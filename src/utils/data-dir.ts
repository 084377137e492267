import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'

const projectRoot = resolve(dirname(fileURLToPath(import.meta.url)), '..', '..')

/**
 * Directory set through `dataDir`. It holds the database, the logs and the
 * `.env` file together, e.g. on a mounted volume.
 */
function dataDirOverride(): string | null {
  return process.env.dataDir || null
}

function dataPath(name: string): string {
  const dataDir = dataDirOverride()
  return dataDir ? resolve(dataDir, name) : resolve(projectRoot, 'data', name)
}

export function resolveDbPath(): string {
  return dataPath('db')
}

export function resolveLogPath(): string {
  return dataPath('logs')
}

// Without an override the .env stays at the project root, beside package.json
export function resolveEnvPath(): string {
  const dataDir = dataDirOverride()
  return dataDir ? resolve(dataDir, '.env') : resolve(projectRoot, '.env')
}
