import pino from 'pino'

/**
 * Log levels:
 * - fatal (60): Crawl cannot start
 * - error (50): Fatal configuration or startup problems
 * - warn (40): Soft failures for a single address (fetch, render, image)
 * - info (30): Crawl lifecycle and saved pages (default)
 * - debug (20): Per-address decisions (skips, robots, render choice)
 * - trace (10): Very detailed trace messages
 */

const LEVELS: readonly pino.LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']

const parseLevel = (value: string | undefined): pino.LevelWithSilent =>
  LEVELS.find((level) => level === value?.toLowerCase()) ?? 'info'

const logLevel = parseLevel(process.env.LOG_LEVEL)

// pino-pretty runs in a worker thread; a silent logger has nothing to format
const baseLogger = pino({
  level: logLevel,
  transport:
    logLevel === 'silent'
      ? undefined
      : {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:HH:MM:ss',
            ignore: 'pid,hostname',
            messageFormat: '{if context}[{context}] {end}{msg}',
            customColors: 'fatal:bgRed,error:red,warn:yellow,info:cyan,debug:green,trace:gray',
            customLevels: 'fatal:60,error:50,warn:40,info:30,debug:20,trace:10'
          }
        }
})

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

const formatArg = (arg: unknown): string => {
  if (arg instanceof Error) {
    return arg.message
  }

  return typeof arg === 'object' ? JSON.stringify(arg) : String(arg)
}

/**
 * Wrapper to make logger more flexible with arguments
 */
const createLoggerWrapper = (logger: pino.Logger): Logger => {
  const wrap = (level: pino.Level): LogFn => {
    return (msgOrObj: unknown, ...args: unknown[]) => {
      if (!logger.isLevelEnabled(level)) {
        return
      }

      if (args.length === 0) {
        logger[level](String(msgOrObj))
        return
      }

      const message = [msgOrObj, ...args].map(formatArg).join(' ')
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
 * log.info('Crawl started');
 * log.debug('Skipping task:', { url, reason: 'depth' });
 * log.warn('Fetch failed', url);
 * log.error('Renderer could not start:', error);
 * ```
 *
 * Set log level via environment variable:
 * ```bash
 * LOG_LEVEL=debug npm run crawl -- https://example.com
 * ```
 */
export const log = createLoggerWrapper(baseLogger)

/**
 * Create a child logger with a specific context
 *
 * @example
 * ```typescript
 * const gateLog = createLogger('PolitenessGate');
 * gateLog.debug('robots.txt loaded');
 * ```
 */
export function createLogger(context: string): Logger {
  return createLoggerWrapper(baseLogger.child({ context }))
}

/**
 * Set the log level dynamically
 */
export function setLogLevel(level: pino.LevelWithSilent): void {
  baseLogger.level = level
}

export type { Logger, LogFn }
