import log from 'electron-log/node'
import { join } from 'path'

/**
 *
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'verbose' | 'debug' | 'silly'

/**
 * Options for the process-wide log setup.
 */
export interface LogServiceOptions {
  /** Console threshold; defaults to 'info' */
  level?: LogLevel
  /** Directory for windlink.log; file output is disabled when omitted */
  logDirectory?: string
}

export type ScopedLogger = ReturnType<typeof log.scope>

const MAX_LOG_FILE_BYTES = 10 * 1024 * 1024

/**
 * Setup the logger as early as possible so every module logs through the same transports.
 * @param {LogServiceOptions} options
 */
export const setupLogService = (options: LogServiceOptions = {}): void => {
  log.transports.console.level = options.level ?? 'info'
  log.transports.console.format = '[{h}:{i}:{s}.{ms}] [{level}]{scope} {text}'

  if (options.logDirectory) {
    const logFile = join(options.logDirectory, 'windlink.log')
    log.transports.file.level = options.level ?? 'info'
    log.transports.file.maxSize = MAX_LOG_FILE_BYTES
    log.transports.file.resolvePathFn = () => logFile
  } else {
    log.transports.file.level = false
  }

  log.errorHandler.startCatching({ showDialog: false })
}

/**
 * Scoped logger for one module, e.g. createLogger('AnemometerWorker').
 * @param {string} scope
 * @returns {ScopedLogger}
 */
export const createLogger = (scope: string): ScopedLogger => log.scope(scope)

/**
 * Silence every transport (used by tests).
 */
export const silenceLogs = (): void => {
  log.transports.console.level = false
  log.transports.file.level = false
}
