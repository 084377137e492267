import fs from 'node:fs'
import { config } from 'dotenv'
import type { FastifyBaseLogger, FastifyRequest } from 'fastify'
import type { LoggerOptions } from 'pino'
import pino from 'pino'
import * as rfs from 'rotating-file-stream'
import { resolveEnvPath, resolveLogPath } from './data-dir.js'

interface FileLoggerOptions extends LoggerOptions {
  stream: rfs.RotatingFileStream | NodeJS.WriteStream
}

interface MultiStreamLoggerOptions extends LoggerOptions {
  stream: pino.MultiStreamRes
}

type MirrorLoggerOptions =
  | LoggerOptions
  | FileLoggerOptions
  | MultiStreamLoggerOptions

// Load .env file early for logger configuration
config({ path: resolveEnvPath() })

const PRETTY_OPTIONS = {
  translateTime: 'HH:MM:ss Z',
  ignore: 'pid,hostname',
  colorize: true,
}

/**
 * Serializes errors (including upstream and integrity errors) with their
 * status, enumerable fields and cause chain.
 */
export function serializeError(err: unknown): unknown {
  if (err == null) {
    return err
  }

  if (typeof err !== 'object') {
    const kind = typeof err
    return {
      message: String(err),
      type: `${kind.charAt(0).toUpperCase()}${kind.slice(1)}Error`,
    }
  }

  const serialized: Record<string, unknown> = {}

  if ('message' in err && err.message) serialized.message = err.message
  if ('name' in err && err.name) serialized.name = err.name
  if ('status' in err && err.status !== undefined)
    serialized.status = err.status
  if ('statusCode' in err && err.statusCode !== undefined)
    serialized.statusCode = err.statusCode

  serialized.type =
    err instanceof Error
      ? err.constructor.name
      : 'name' in err && typeof err.name === 'string' && err.name
        ? err.name
        : 'UnknownError'

  // Skip stacks for 4xx errors
  const statusCode =
    'statusCode' in err && typeof err.statusCode === 'number'
      ? err.statusCode
      : 'status' in err && typeof err.status === 'number'
        ? err.status
        : undefined
  const shouldIncludeStack = !statusCode || statusCode >= 500
  if ('stack' in err && err.stack && shouldIncludeStack) {
    serialized.stack = err.stack
  }

  if ('cause' in err && err.cause) {
    serialized.cause = serializeError(err.cause)
  }

  for (const [key, value] of Object.entries(err)) {
    if (
      !['message', 'stack', 'name', 'status', 'statusCode', 'type'].includes(
        key,
      )
    ) {
      serialized[key] = value
    }
  }

  return serialized
}

/**
 * Request serializer that redacts credentials from query strings.
 */
function createRequestSerializer() {
  return (req: FastifyRequest) => {
    const serialized = {
      method: req.method,
      url: req.url,
      host: req.headers.host,
      remoteAddress: req.ip,
      remotePort: req.socket.remotePort,
    }

    if (serialized.url) {
      serialized.url = serialized.url
        .replace(/([?&])password=([^&]+)/gi, '$1password=[REDACTED]')
        .replace(/([?&])token=([^&]+)/gi, '$1token=[REDACTED]')
    }

    return serialized
  }
}

const serializers = {
  req: createRequestSerializer(),
  error: serializeError,
}

/**
 * Rotated log filenames look like `recipe-mirror-2024-05-01[-index].log`.
 */
function filename(time: number | Date, index?: number): string {
  if (!time) return 'recipe-mirror-current.log'
  const date = typeof time === 'number' ? new Date(time) : time
  const year = date.getFullYear()
  const month = String(date.getMonth() + 1).padStart(2, '0')
  const day = String(date.getDate()).padStart(2, '0')
  const indexStr = index ? `-${index}` : ''
  return `recipe-mirror-${year}-${month}-${day}${indexStr}.log`
}

/**
 * Rotating file stream in the log directory, or stdout when the directory
 * cannot be created.
 */
function getFileStream(): rfs.RotatingFileStream | NodeJS.WriteStream {
  const logDirectory = resolveLogPath()
  try {
    if (!fs.existsSync(logDirectory)) {
      fs.mkdirSync(logDirectory, { recursive: true })
    }
    return rfs.createStream(filename, {
      size: '10M',
      path: logDirectory,
      compress: 'gzip',
      maxFiles: 7,
    })
  } catch (err) {
    console.error('Failed to setup log directory:', err)
    return process.stdout
  }
}

function getTerminalOptions(): LoggerOptions {
  return {
    level: 'info',
    transport: {
      target: 'pino-pretty',
      options: PRETTY_OPTIONS,
    },
    serializers,
  }
}

/**
 * Builds the Fastify logger options from environment variables:
 * - enableConsoleOutput: pretty terminal output (default: true)
 * - enableFileLogging: rotating file under the log directory (default: true)
 */
export function createLoggerConfig(): MirrorLoggerOptions {
  const enableConsoleOutput = process.env.enableConsoleOutput !== 'false'
  const enableFileLogging = process.env.enableFileLogging !== 'false'

  if (!enableFileLogging) {
    return enableConsoleOutput
      ? getTerminalOptions()
      : { level: 'info', serializers }
  }

  const fileStream = getFileStream()

  if (!enableConsoleOutput) {
    return { level: 'info', stream: fileStream, serializers }
  }

  // File stream fell back to stdout, avoid double-logging
  if (fileStream === process.stdout) {
    return getTerminalOptions()
  }

  const prettyStream = pino.transport({
    target: 'pino-pretty',
    options: PRETTY_OPTIONS,
  })

  return {
    level: 'info',
    stream: pino.multistream([{ stream: prettyStream }, { stream: fileStream }]),
    serializers,
  }
}

/**
 * Child logger whose messages carry a `[NAME]` prefix. Inherits the parent's
 * current level.
 */
export function createServiceLogger(
  log: FastifyBaseLogger,
  name: string,
): FastifyBaseLogger {
  return log.child({}, { msgPrefix: `[${name}] ` })
}
