import pino from 'pino'

/**
 * Log levels:
 * - fatal (60): Application crash
 * - error (50): Error messages
 * - warn (40): Warning messages, e.g. a page fetch that will be retried
 * - info (30): General informational messages (default)
 * - debug (20): Per-request details
 * - trace (10): Very detailed trace messages
 */
type LogLevel = pino.LevelWithSilent

type LogFn = (msgOrObj: unknown, ...args: unknown[]) => void

type Logger = {
  fatal: LogFn
  error: LogFn
  warn: LogFn
  info: LogFn
  debug: LogFn
  trace: LogFn
  child: (bindings: pino.Bindings) => Logger
}

const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']

/**
 * Map a raw `LOG_LEVEL` value onto a pino level, falling back when it is unset or unknown.
 */
export function resolveLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  const normalized = value?.trim().toLowerCase()
  return LOG_LEVELS.find(level => level === normalized) ?? fallback
}

function createBaseLogger(): pino.Logger {
  const level = resolveLogLevel(process.env.LOG_LEVEL)

  // Plain JSON lines for CI logs and tests; pretty output for local runs
  if (process.env.LOG_FORMAT === 'json') {
    return pino({ level })
  }

  return pino({
    level,
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:HH:MM:ss',
        ignore: 'pid,hostname',
        messageFormat: '{if context}[{context}] {end}{msg}',
        customColors: 'fatal:bgRed,error:red,warn:yellow,info:cyan,debug:green,trace:gray'
      }
    }
  })
}

const baseLogger = createBaseLogger()

function stringifyArg(arg: unknown): string {
  if (arg instanceof Error) {
    return arg.message
  }

  if (typeof arg === 'object' && arg !== null) {
    return JSON.stringify(arg)
  }

  return String(arg)
}

/**
 * Flatten a message plus trailing arguments into a single log line.
 * Errors contribute their message, objects are serialized as JSON.
 */
export function formatLogMessage(msgOrObj: unknown, args: readonly unknown[]): string {
  return [msgOrObj, ...args].map(stringifyArg).join(' ')
}

const wrapLogger = (logger: pino.Logger): Logger => {
  const wrap =
    (level: Exclude<LogLevel, 'silent'>): LogFn =>
    (msgOrObj, ...args) => {
      if (!logger.isLevelEnabled(level)) {
        return
      }

      logger[level](formatLogMessage(msgOrObj, args))
    }

  return {
    fatal: wrap('fatal'),
    error: wrap('error'),
    warn: wrap('warn'),
    info: wrap('info'),
    debug: wrap('debug'),
    trace: wrap('trace'),
    child: bindings => wrapLogger(logger.child(bindings))
  }
}

/**
 * Logger instance for the application
 *
 * Usage:
 * ```typescript
 * import { log } from '@workspace/logger'
 *
 * log.info('Fetching page', url)
 * log.warn('Rate limited:', { attempt: 2 })
 * log.error('Fetch failed:', error)
 * ```
 *
 * Set the level and output format via environment variables:
 * ```bash
 * LOG_LEVEL=debug npm run scrape -- fbref --teamId=e4a775cb --teamName=Nottingham-Forest --season=2025-2026
 * LOG_FORMAT=json npm run scrape -- fetch --url=https://fbref.com/en/
 * ```
 */
export const log = wrapLogger(baseLogger)

/**
 * Create a child logger whose lines are tagged with `context`.
 *
 * @example
 * ```typescript
 * const fetcherLog = createLogger('Fetcher')
 * fetcherLog.debug('Attempt 1 succeeded')
 * ```
 */
export function createLogger(context: string): Logger {
  return wrapLogger(baseLogger.child({ context }))
}

export type { Logger, LogFn, LogLevel }
