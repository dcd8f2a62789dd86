import pino from 'pino'

/**
 * Log levels:
 * - fatal (60): Run aborted (structural failure)
 * - error (50): Error messages
 * - warn (40): Failed fetch attempts, exhausted retries
 * - info (30): Progress and run summary (default)
 * - debug (20): Resolution failures, extraction misses
 * - trace (10): Very detailed trace messages
 */

const isLevel = (value: string | undefined): value is pino.LevelWithSilent =>
  value !== undefined && (value === 'silent' || value in pino.levels.values)

// Get log level from environment variable or default to 'info'
const logLevel: pino.LevelWithSilent = isLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : 'info'

const prettyStream = pino.transport({
  target: 'pino-pretty',
  options: {
    colorize: true,
    translateTime: 'SYS:HH:MM:ss',
    ignore: 'pid,hostname',
    messageFormat: '{msg}',
    customColors: 'fatal:bgRed,error:red,warn:yellow,info:cyan,debug:green,trace:gray',
    customLevels: 'fatal:60,error:50,warn:40,info:30,debug:20,trace:10'
  }
})

// Streams accept everything; the logger level does the filtering
const destinations = pino.multistream([{ level: 'trace', stream: prettyStream }])

// Create the base logger
const baseLogger = pino({ level: logLevel }, destinations)

/**
 * Wrapper to make logger more flexible with arguments
 */
const createLoggerWrapper = (logger: pino.Logger) => {
  const wrap = (level: pino.Level) => {
    return (msgOrObj: unknown, ...args: unknown[]) => {
      if (args.length === 0) {
        // Single argument - just log it
        logger[level](String(msgOrObj))
      } else if (args.length === 1) {
        // Two arguments: message and data
        const [data] = args
        logger[level](
          `${msgOrObj} ${
            data instanceof Error ? data.message : typeof data === 'object' ? JSON.stringify(data, null, 2) : String(data)
          }`
        )
      } else {
        // Multiple arguments - concat them
        const message = [msgOrObj, ...args]
          .map(arg => (typeof arg === 'object' ? JSON.stringify(arg, null, 2) : String(arg)))
          .join(' ')
        logger[level](message)
      }
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

type Logger = ReturnType<typeof createLoggerWrapper>

/**
 * Logger instance for the application
 *
 * Usage:
 * ```typescript
 * import { log } from '@workspace/logger';
 *
 * log.info('Starting enrichment...');
 * log.debug('Detailed info:', { data: 'value' });
 * log.warn('Fetch attempt failed');
 * log.error('Error occurred:', error);
 * ```
 *
 * Set log level via environment variable:
 * ```bash
 * LOG_LEVEL=debug npm run enrich -- --inputDir=./input --outputDir=./output
 * ```
 */
export const log: Logger = createLoggerWrapper(baseLogger)

/**
 * Create a child logger with a specific context
 *
 * @param context - Context name for the logger
 *
 * @example
 * ```typescript
 * const fetchLog = createLogger('Page Fetcher');
 * fetchLog.info('Fetching page...');
 * ```
 */
export function createLogger(context: string): Logger {
  return createLoggerWrapper(baseLogger.child({ context }))
}

/**
 * Set the log level dynamically
 *
 * @example
 * ```typescript
 * setLogLevel('debug');
 * ```
 */
export function setLogLevel(level: pino.LevelWithSilent): void {
  baseLogger.level = level
}

/**
 * Mirror every log line into an append-only file (one file per run).
 * Parent directories are created when missing.
 */
export function attachLogFile(filePath: string): string {
  const fileStream = pino.destination({ dest: filePath, append: true, mkdir: true, sync: true })
  destinations.add({ level: 'trace', stream: fileStream })
  return filePath
}

export type { Logger }
