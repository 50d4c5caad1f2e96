import fs from 'node:fs'
import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'
import { config } from 'dotenv'
import type { FastifyBaseLogger, FastifyRequest } from 'fastify'
import type { LevelWithSilent, LoggerOptions } from 'pino'
import pino from 'pino'
import * as rfs from 'rotating-file-stream'

export const validLogLevels: LevelWithSilent[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
]

export type LogDestination = 'terminal' | 'file' | 'both'

interface FileLoggerOptions extends LoggerOptions {
  stream: rfs.RotatingFileStream | NodeJS.WriteStream
}

interface MultiStreamLoggerOptions extends LoggerOptions {
  stream: pino.MultiStreamRes
}

type ReconcilerLoggerOptions =
  | LoggerOptions
  | FileLoggerOptions
  | MultiStreamLoggerOptions

const projectRoot = resolve(dirname(fileURLToPath(import.meta.url)), '..', '..')

// Load .env file early for logger configuration
config({ path: resolve(projectRoot, '.env') })

const KNOWN_ERROR_KEYS = [
  'message',
  'stack',
  'name',
  'status',
  'statusCode',
  'type',
  'kind',
  'cause',
]

/**
 * Creates an error serializer that keeps message, name, status codes, the
 * remote failure kind and the cause chain of errors.
 *
 * Stack traces are dropped for 4xx errors to keep client mistakes quiet.
 */
export function createErrorSerializer() {
  const serialize = (err: unknown): unknown => {
    if (err == null) {
      return err
    }

    if (typeof err !== 'object') {
      const primitiveType =
        typeof err === 'string'
          ? 'StringError'
          : typeof err === 'number'
            ? 'NumberError'
            : typeof err === 'boolean'
              ? 'BooleanError'
              : 'UnknownError'
      return { message: String(err), type: primitiveType }
    }

    const serialized: Record<string, unknown> = {}

    if ('message' in err && err.message) serialized.message = err.message
    if ('name' in err && err.name) serialized.name = err.name
    if ('status' in err && err.status != null) serialized.status = err.status
    if ('statusCode' in err && err.statusCode !== undefined)
      serialized.statusCode = err.statusCode
    if ('kind' in err && typeof err.kind === 'string') serialized.kind = err.kind

    if (err instanceof TypeError) {
      serialized.type = 'TypeError'
    } else if (err instanceof RangeError) {
      serialized.type = 'RangeError'
    } else if (err instanceof Error) {
      serialized.type = err.name || 'Error'
    } else if ('name' in err && typeof err.name === 'string' && err.name) {
      serialized.type = err.name
    } else {
      serialized.type = 'UnknownError'
    }

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

    // cause is non-enumerable on Error, so it is copied explicitly
    if ('cause' in err && err.cause) {
      serialized.cause = serialize(err.cause)
    }

    for (const [key, value] of Object.entries(err)) {
      if (!KNOWN_ERROR_KEYS.includes(key)) {
        serialized[key] = value
      }
    }

    return serialized
  }

  return serialize
}

/**
 * Returns a request serializer that redacts tokens from the logged URL.
 */
export function createRequestSerializer() {
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
        .replace(/([?&])access_token=([^&]+)/gi, '$1access_token=[REDACTED]')
        .replace(/([?&])token=([^&]+)/gi, '$1token=[REDACTED]')
        .replace(/([?&])code=([^&]+)/gi, '$1code=[REDACTED]')
    }

    return serialized
  }
}

/**
 * Generates the rotated log filename for a date, or the current file's
 * name when rotation has not happened yet.
 */
function filename(time: number | Date, index?: number): string {
  if (!time) return 'playlist-reconciler-current.log'
  const date = typeof time === 'number' ? new Date(time) : time
  const year = date.getFullYear()
  const month = String(date.getMonth() + 1).padStart(2, '0')
  const day = String(date.getDate()).padStart(2, '0')
  const indexStr = index ? `-${index}` : ''
  return `playlist-reconciler-${year}-${month}-${day}${indexStr}.log`
}

/**
 * Creates a rotating file stream under `data/logs`, falling back to stdout
 * when the directory cannot be created.
 */
function getFileStream(): rfs.RotatingFileStream | NodeJS.WriteStream {
  const logDirectory = resolve(projectRoot, 'data', 'logs')
  try {
    if (!fs.existsSync(logDirectory)) {
      fs.mkdirSync(logDirectory, { recursive: true })
    }
    return rfs.createStream(filename, {
      size: '10M',
      interval: '1d',
      path: logDirectory,
      compress: 'gzip',
      maxFiles: 7,
    })
  } catch (err) {
    console.error('Failed to setup log directory:', err)
    return process.stdout
  }
}

const prettyOptions = {
  translateTime: 'HH:MM:ss Z',
  ignore: 'pid,hostname',
  colorize: true,
}

function getTerminalOptions(): LoggerOptions {
  return {
    level: 'info',
    transport: {
      target: 'pino-pretty',
      options: prettyOptions,
    },
    serializers: {
      req: createRequestSerializer(),
      err: createErrorSerializer(),
      error: createErrorSerializer(),
    },
  }
}

function getFileOptions(): FileLoggerOptions {
  return {
    level: 'info',
    stream: getFileStream(),
    serializers: {
      req: createRequestSerializer(),
      err: createErrorSerializer(),
      error: createErrorSerializer(),
    },
  }
}

function parseDestination(value: string | undefined): LogDestination {
  return value === 'file' || value === 'both' ? value : 'terminal'
}

/**
 * Builds the Fastify logger options for the destination named by the
 * `logDestination` environment variable (terminal by default).
 */
export function createLoggerConfig(
  destination: LogDestination = parseDestination(process.env.logDestination),
): ReconcilerLoggerOptions {
  if (destination === 'terminal') {
    return getTerminalOptions()
  }

  if (destination === 'file') {
    return getFileOptions()
  }

  const fileStream = getFileStream()

  // Avoid double-logging if the file stream fell back to stdout
  if (fileStream === process.stdout) {
    return getTerminalOptions()
  }

  const prettyStream = pino.transport({
    target: 'pino-pretty',
    options: prettyOptions,
  })

  const multistream = pino.multistream([
    { stream: prettyStream },
    { stream: fileStream },
  ])

  return {
    level: 'info',
    stream: multistream,
    serializers: {
      req: createRequestSerializer(),
      err: createErrorSerializer(),
      error: createErrorSerializer(),
    },
  }
}

/**
 * Creates a child logger whose messages carry an uppercased `[SERVICE] `
 * prefix.
 */
export function createServiceLogger(
  parentLogger: FastifyBaseLogger,
  serviceName: string,
): FastifyBaseLogger {
  return parentLogger.child({}, { msgPrefix: `[${serviceName.toUpperCase()}] ` })
}
