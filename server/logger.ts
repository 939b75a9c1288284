import { AsyncLocalStorage } from 'async_hooks'
import fs from 'fs'
import os from 'os'
import path from 'path'
import { createRequire } from 'module'
import pino, { type DestinationStream, type LevelWithSilent } from 'pino'
import { createStream, type RotatingFileStream } from 'rotating-file-stream'

const env = process.env.NODE_ENV || 'development'
const level = process.env.LOG_LEVEL || 'debug'
const DEBUG_LOG_FILE = 'server-debug.jsonl'

type SizeString = `${number}B` | `${number}K` | `${number}M` | `${number}G`

/** Fields every line logged on behalf of a client connection carries. */
export type LogContext = {
  connectionId?: string
  sessionId?: string
  endpoint?: string
}

const logContext = new AsyncLocalStorage<LogContext>()
const require = createRequire(import.meta.url)

type PrettyFactory = (options: { colorize: boolean; translateTime: string; destination: number }) => DestinationStream

/** Run `fn` with `context` merged into every log line it emits, including async continuations. */
export function withLogContext<T>(context: LogContext, fn: () => T): T {
  const parent = logContext.getStore()
  return logContext.run(parent ? { ...parent, ...context } : context, fn)
}

/**
 * The rotating debug JSONL file: `LOG_DEBUG_PATH`, else `server-debug.jsonl`
 * under `EDITSERVE_LOG_DIR` or `~/.editserve/logs`. Off under test unless a
 * path is given.
 */
export function resolveDebugLogPath(
  envVars: NodeJS.ProcessEnv = process.env,
  homeDir: string = os.homedir(),
): string | null {
  const explicitPath = envVars.LOG_DEBUG_PATH?.trim()
  if (explicitPath) return path.resolve(explicitPath)
  if (envVars.NODE_ENV === 'test' || envVars.VITEST) return null

  const logDir = envVars.EDITSERVE_LOG_DIR?.trim()
  return path.join(logDir ? path.resolve(logDir) : path.join(homeDir, '.editserve', 'logs'), DEBUG_LOG_FILE)
}

export function createDebugFileStream(
  filePath: string,
  options: { size?: SizeString; maxFiles?: number } = {},
): RotatingFileStream {
  const dir = path.dirname(filePath)
  fs.mkdirSync(dir, { recursive: true })
  return createStream(path.basename(filePath), { path: dir, size: options.size ?? '10M', maxFiles: options.maxFiles ?? 5 })
}

function createPinoOptions(): pino.LoggerOptions {
  return {
    level,
    base: {
      app: 'editserve',
      pid: process.pid,
      env,
      version: process.env.npm_package_version,
    },
    formatters: {
      level(label: string, number: number) {
        return { level: number, severity: label }
      },
    },
    mixin() {
      // pino mutates the object returned by `mixin()`; hand out a fresh copy.
      const ctx = logContext.getStore()
      return ctx ? { ...ctx } : {}
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  }
}

/** Console output goes to stderr; stdout is left to the command line client. */
function createConsoleStream(): DestinationStream {
  if (env === 'production' || env === 'test') return pino.destination(2)
  const pinoPretty: PrettyFactory = require('pino-pretty')
  return pinoPretty({ colorize: true, translateTime: 'SYS:standard', destination: 2 })
}

export function createLogger(destination?: DestinationStream): pino.Logger {
  if (destination) return pino(createPinoOptions(), destination)

  const consoleStream = createConsoleStream()
  const streams: Array<{ stream: DestinationStream; level: LevelWithSilent }> = [{ stream: consoleStream, level: 'info' }]

  const debugLogPath = resolveDebugLogPath()
  if (debugLogPath) {
    const consoleLogger = pino(createPinoOptions(), consoleStream)
    try {
      const debugStream = createDebugFileStream(debugLogPath)
      let warned = false
      const warnOnce = (err: Error, event: string) => {
        if (warned) return
        warned = true
        consoleLogger.warn({ err, filePath: debugLogPath, event }, 'Debug log stream issue')
      }
      debugStream.on('error', (err: Error) => warnOnce(err, 'error'))
      debugStream.on('warning', (err: Error) => warnOnce(err, 'warning'))
      streams.push({ stream: debugStream, level: 'debug' })
    } catch (err) {
      consoleLogger.warn({ err, filePath: debugLogPath }, 'Debug log file disabled')
    }
  }

  return pino(createPinoOptions(), pino.multistream(streams))
}

export const logger = createLogger()
