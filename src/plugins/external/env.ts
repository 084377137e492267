import { resolve } from 'node:path'
import env from '@fastify/env'
import type { Config } from '@root/types/config.types.js'
import { resolveDbPath, resolveEnvPath } from '@utils/data-dir.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

const schema = {
  type: 'object',
  required: ['port'],
  properties: {
    port: {
      type: 'number',
      default: 3003,
    },
    logLevel: {
      type: 'string',
      enum: ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'],
      default: 'info',
    },
    enableConsoleOutput: {
      type: 'boolean',
      default: true,
    },
    enableFileLogging: {
      type: 'boolean',
      default: true,
    },
    closeGraceDelay: {
      type: 'number',
      default: 10000,
    },
    dbType: {
      type: 'string',
      enum: ['sqlite', 'postgres'],
      default: 'sqlite',
    },
    dbPath: {
      type: 'string',
      default: resolve(resolveDbPath(), 'recipe-mirror.db'),
    },
    dbHost: {
      type: 'string',
      default: 'localhost',
    },
    dbPort: {
      type: 'number',
      default: 5432,
    },
    dbName: {
      type: 'string',
      default: 'recipe_mirror',
    },
    dbUser: {
      type: 'string',
      default: 'postgres',
    },
    dbPassword: {
      type: 'string',
      default: '',
    },
    dbConnectionString: {
      type: 'string',
      default: '',
    },
    upstreamBaseUrl: {
      type: 'string',
      default: '',
    },
    upstreamToken: {
      type: 'string',
      default: '',
    },
    upstreamEmail: {
      type: 'string',
      default: '',
    },
    upstreamPassword: {
      type: 'string',
      default: '',
    },
    upstreamTimeoutMs: {
      type: 'number',
      default: 30000,
    },
    syncIntervalMinutes: {
      type: 'number',
      minimum: 0,
      default: 30,
    },
    syncConcurrency: {
      type: 'number',
      minimum: 1,
      default: 4,
    },
    syncMaxRetries: {
      type: 'number',
      minimum: 0,
      default: 3,
    },
    syncRetryBaseMs: {
      type: 'number',
      minimum: 0,
      default: 1000,
    },
    hydrateConcurrency: {
      type: 'number',
      minimum: 1,
      default: 4,
    },
  },
}

declare module 'fastify' {
  interface FastifyInstance {
    config: Config
  }
}

/**
 * Throws when the loaded settings cannot work together.
 */
export function validateConfig(config: Config, log: FastifyInstance['log']) {
  if (config.dbType === 'postgres') {
    const connStr = config.dbConnectionString.trim()

    if (connStr !== '') {
      if (
        !connStr.startsWith('postgres://') &&
        !connStr.startsWith('postgresql://')
      ) {
        throw new Error(
          'Invalid PostgreSQL connection string format. Must start with postgres:// or postgresql://',
        )
      }
    } else {
      if (config.dbPassword.trim() === '') {
        log.error(
          'PostgreSQL database selected but no password provided. This is a security risk.',
        )
        throw new Error(
          'dbPassword is required when using PostgreSQL. Please set a secure password.',
        )
      }
      if (config.dbHost.trim() === '') {
        throw new Error('dbHost is required when using PostgreSQL.')
      }
      if (config.dbName.trim() === '') {
        throw new Error('dbName is required when using PostgreSQL.')
      }
      if (config.dbUser.trim() === '') {
        throw new Error('dbUser is required when using PostgreSQL.')
      }
    }
  }

  if (config.upstreamBaseUrl.trim() === '') {
    throw new Error('upstreamBaseUrl is required.')
  }
  try {
    new URL(config.upstreamBaseUrl)
  } catch (error) {
    throw new Error(
      `upstreamBaseUrl is not a valid URL: ${config.upstreamBaseUrl}`,
      { cause: error },
    )
  }

  const hasLogin =
    config.upstreamEmail.trim() !== '' && config.upstreamPassword !== ''
  if (config.upstreamToken.trim() === '' && !hasLogin) {
    log.warn(
      'No upstream token or email/password configured; sync passes will fail until one is set',
    )
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    await fastify.register(env, {
      confKey: 'config',
      schema,
      dotenv: {
        path: resolveEnvPath(),
        debug: process.env.NODE_ENV === 'development',
      },
      data: process.env,
    })

    validateConfig(fastify.config, fastify.log)
  },
  {
    name: 'config',
  },
)
