import pino from 'pino'

/**
 * Log levels:
 * - fatal (60): Run aborted (checkpoint could not be persisted, listing unreachable)
 * - error (50): Error messages
 * - warn (40): Per-item failures that were recorded and skipped
 * - info (30): Progress messages (default)
 * - debug (20): Skips, scroll attempts, checkpoint writes
 * - trace (10): Very detailed trace messages
 */

const LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const

type LogLevel = (typeof LEVELS)[number]

const isLogLevel = (value: string): value is LogLevel =>
  (LEVELS as readonly string[]).includes(value)

const resolveLevel = (raw: string | undefined): LogLevel => {
  const normalized = raw?.trim().toLowerCase() ?? ''
  return isLogLevel(normalized) ? normalized : 'info'
}

const logLevel = resolveLevel(process.env.LOG_LEVEL)
const logFile = process.env.LOG_FILE?.trim()

const buildTransport = (): pino.TransportMultiOptions | undefined => {
  // No worker thread when nothing would be written
  if (logLevel === 'silent') {
    return undefined
  }

  const targets: pino.TransportTargetOptions[] = [
    {
      target: 'pino-pretty',
      level: logLevel,
      options: {
        colorize: true,
        translateTime: 'SYS:HH:MM:ss',
        ignore: 'pid,hostname',
        messageFormat: '{if context}[{context}] {end}{msg}',
        customColors: 'fatal:bgRed,error:red,warn:yellow,info:cyan,debug:green,trace:gray'
      }
    }
  ]

  if (logFile) {
    targets.push({
      target: 'pino/file',
      level: logLevel,
      options: { destination: logFile, mkdir: true }
    })
  }

  return { targets }
}

const baseLogger = pino({
  level: logLevel,
  transport: buildTransport()
})

const describeArg = (arg: unknown): string => {
  if (arg instanceof Error) {
    return arg.message
  }

  return typeof arg === 'object' ? JSON.stringify(arg, null, 2) : String(arg)
}

type LogMethod = (msgOrObj: unknown, ...args: unknown[]) => void

type Logger = {
  fatal: LogMethod
  error: LogMethod
  warn: LogMethod
  info: LogMethod
  debug: LogMethod
  trace: LogMethod
  child: (bindings: pino.Bindings) => Logger
}

/**
 * Accepts `(message)`, `(message, data)` or any number of values and always
 * hands pino a single rendered string.
 */
const createLoggerWrapper = (logger: pino.Logger): Logger => {
  const wrap = (level: Exclude<LogLevel, 'silent'>): LogMethod => {
    return (msgOrObj: unknown, ...args: unknown[]) => {
      if (args.length === 0) {
        logger[level](String(msgOrObj))
        return
      }

      const message = [msgOrObj, ...args].map(describeArg).join(' ')
      logger[level](message)
    }
  }

  return {
    fatal: wrap('fatal'),
    error: wrap('error'),
    warn: wrap('warn'),
    info: wrap('info'),
    debug: wrap('debug'),
    trace: wrap('trace'),
    child: (bindings: pino.Bindings) => createLoggerWrapper(logger.child(bindings))
  }
}

/**
 * Logger instance for the application
 *
 * Usage:
 * ```typescript
 * import { log } from '@workspace/logger';
 *
 * log.info('Starting crawl...');
 * log.debug('Checkpoint written:', { seen: 42 });
 * log.warn('Thread skipped');
 * log.error('Listing failed:', error);
 * ```
 *
 * Set log level (and an optional log file) via environment variables:
 * ```bash
 * LOG_LEVEL=debug LOG_FILE=data/harvester.log npm run harvest -- crawl
 * ```
 */
export const log = createLoggerWrapper(baseLogger)

/**
 * Create a child logger whose lines are prefixed with `context`.
 *
 * @example
 * ```typescript
 * const controllerLog = createLogger('crawl-controller');
 * controllerLog.info('Resuming collection');
 * ```
 */
export function createLogger(context: string): Logger {
  return createLoggerWrapper(baseLogger.child({ context }))
}

export function setLogLevel(level: LogLevel): void {
  baseLogger.level = level
}

export type { Logger, LogLevel }
