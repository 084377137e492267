import { resolve } from 'node:path'
import { fileURLToPath } from 'node:url'
import {
  resolveDbPath,
  resolveEnvPath,
  resolveLogPath,
} from '@utils/data-dir.js'
import { afterEach, describe, expect, it } from 'vitest'

const projectRoot = fileURLToPath(new URL('../../../', import.meta.url))

describe('data-dir', () => {
  const originalDataDir = process.env.dataDir

  afterEach(() => {
    if (originalDataDir === undefined) {
      delete process.env.dataDir
    } else {
      process.env.dataDir = originalDataDir
    }
  })

  it('should keep files under the project root by default', () => {
    delete process.env.dataDir

    expect(resolveDbPath()).toBe(resolve(projectRoot, 'data', 'db'))
    expect(resolveLogPath()).toBe(resolve(projectRoot, 'data', 'logs'))
    expect(resolveEnvPath()).toBe(resolve(projectRoot, '.env'))
  })

  it('should move every file under dataDir when set', () => {
    process.env.dataDir = '/srv/recipe-mirror'

    expect(resolveDbPath()).toBe(resolve('/srv/recipe-mirror', 'db'))
    expect(resolveLogPath()).toBe(resolve('/srv/recipe-mirror', 'logs'))
    expect(resolveEnvPath()).toBe(resolve('/srv/recipe-mirror', '.env'))
  })

  it('should ignore an empty dataDir', () => {
    process.env.dataDir = ''

    expect(resolveDbPath()).toBe(resolve(projectRoot, 'data', 'db'))
  })
})
