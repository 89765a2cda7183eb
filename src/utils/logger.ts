import fs from 'node:fs'
import { resolve } from 'node:path'
import { projectRoot } from '@utils/project-root.js'
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

interface StreamLoggerOptions extends LoggerOptions {
  stream: rfs.RotatingFileStream | pino.MultiStreamRes
}

type NotifyLoggerOptions = LoggerOptions | StreamLoggerOptions

// Load .env file early for logger configuration
config({ path: resolve(projectRoot, '.env') })

type Serializable = Error | Record<string, unknown> | string | number | boolean

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null
}

/**
 * Serializes thrown values, keeping status codes and the cause chain.
 * Stack traces are dropped for 4xx errors.
 */
export function createErrorSerializer() {
  const serialize = (err: Serializable): Serializable => {
    if (err == null) {
      return err
    }

    if (typeof err !== 'object') {
      const primitiveType =
        typeof err === 'string'
          ? 'StringError'
          : typeof err === 'number'
            ? 'NumberError'
            : 'BooleanError'
      return { message: String(err), type: primitiveType }
    }

    const serialized: Record<string, unknown> = {}

    if ('message' in err && err.message) serialized.message = err.message
    if ('name' in err && err.name) serialized.name = err.name
    if ('status' in err && err.status !== undefined)
      serialized.status = err.status
    if ('statusCode' in err && err.statusCode !== undefined)
      serialized.statusCode = err.statusCode

    if (err instanceof Error) {
      serialized.type = err.constructor.name
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

    // cause is non-enumerable on Error
    if ('cause' in err && err.cause) {
      const cause = err.cause
      serialized.cause =
        cause instanceof Error || isRecord(cause)
          ? serialize(cause)
          : String(cause)
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
  return serialize
}

/**
 * Returns a Fastify request serializer that redacts secrets passed in the
 * query string.
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
        .replace(/([?&])secret=([^&]+)/gi, '$1secret=[REDACTED]')
        .replace(/([?&])authToken=([^&]+)/gi, '$1authToken=[REDACTED]')
        .replace(/([?&])csrfToken=([^&]+)/gi, '$1csrfToken=[REDACTED]')
        .replace(/([?&])token=([^&]+)/gi, '$1token=[REDACTED]')
    }

    return serialized
  }
}

/**
 * Rotated log filename: 'xitter-notify-YYYY-MM-DD[-index].log', or
 * 'xitter-notify-current.log' for the active file.
 */
export function logFilename(time: number | Date, index?: number): string {
  if (!time) return 'xitter-notify-current.log'
  const date = typeof time === 'number' ? new Date(time) : time
  const year = date.getFullYear()
  const month = String(date.getMonth() + 1).padStart(2, '0')
  const day = String(date.getDate()).padStart(2, '0')
  const indexStr = index ? `-${index}` : ''
  return `xitter-notify-${year}-${month}-${day}${indexStr}.log`
}

/**
 * Creates a rotating file stream under the given directory, or returns
 * null when the directory cannot be created.
 */
function getFileStream(logDirectory: string): rfs.RotatingFileStream | null {
  try {
    if (!fs.existsSync(logDirectory)) {
      fs.mkdirSync(logDirectory, { recursive: true })
    }
    return rfs.createStream(logFilename, {
      size: '10M',
      path: logDirectory,
      compress: 'gzip',
      maxFiles: 7,
    })
  } catch (err) {
    console.error('Failed to setup log directory:', err)
    return null
  }
}

const prettyOptions = {
  translateTime: 'HH:MM:ss Z',
  ignore: 'pid,hostname',
  colorize: true,
}

/**
 * Builds the Fastify logger options from the environment.
 *
 * - logDir: also write rotated log files to this directory (unset: terminal only)
 * - enableConsoleOutput: pretty output in the terminal (default: true)
 */
export function createLoggerConfig(
  env: NodeJS.ProcessEnv = process.env,
): NotifyLoggerOptions {
  const enableConsoleOutput = env.enableConsoleOutput !== 'false'
  const logDir = env.logDir ? resolve(projectRoot, env.logDir) : null
  const serializers = {
    req: createRequestSerializer(),
    error: createErrorSerializer(),
  }

  const fileStream = logDir ? getFileStream(logDir) : null

  if (!fileStream) {
    return {
      level: 'info',
      ...(enableConsoleOutput
        ? { transport: { target: 'pino-pretty', options: prettyOptions } }
        : { enabled: false }),
      serializers,
    }
  }

  if (!enableConsoleOutput) {
    return { level: 'info', stream: fileStream, serializers }
  }

  const prettyStream = pino.transport({
    target: 'pino-pretty',
    options: prettyOptions,
  })

  return {
    level: 'info',
    stream: pino.multistream([
      { stream: prettyStream },
      { stream: fileStream },
    ]),
    serializers,
  }
}

/**
 * Child logger whose messages carry a `[NAME]` prefix.
 */
export function createServiceLogger(
  baseLog: FastifyBaseLogger,
  name: string,
): FastifyBaseLogger {
  return baseLog.child({}, { msgPrefix: `[${name}] ` })
}
