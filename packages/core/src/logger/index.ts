import pino from 'pino'

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error'

/**
 * LoggerProvider is a class that provides logging functionality.
 * It is a wrapper around the pino logger.
 * It is a singleton class.
 * @description Before using the logger, it must be initialized with this method at the top of the entry point file.
 */
export class LoggerProvider {
  private pino = pino(
    {
      level: process.env['LOG_LEVEL'] || 'info',
    },
    pino.multistream(
      [
        { level: 'trace', stream: process.stdout },
        { level: 'error', stream: process.stderr },
      ],
      { dedupe: true },
    ),
  )
  private hasBeenInitialized = false

  get level() {
    return this.pino.level
  }

  init(level?: LogLevel) {
    if (level) {
      this.pino.level = level
    }
    this.pino.info('LoggerProvider initialized')
    this.hasBeenInitialized = true
  }

  info(message: string, ...args: unknown[]) {
    this._safeLog('info', message, args)
  }

  debug(message: string, ...args: unknown[]) {
    this._safeLog('debug', message, args)
  }

  warn(message: string, ...args: unknown[]) {
    this._safeLog('warn', message, args)
  }

  error(message: string, error?: unknown, ..._args: unknown[]) {
    this._safeLog('error', message, [error, ..._args])
  }

  /**
   * Falls back to the console while the logger is not initialized
   */
  private _safeLog(
    level: 'info' | 'debug' | 'warn' | 'error',
    message: string,
    args: unknown[],
  ) {
    if (!this.hasBeenInitialized) {
      const timestamp = new Date().toISOString()
      const logMessage = `[${timestamp}] [${level.toUpperCase()}] ${message}`

      if (level === 'error') {
        console.error(logMessage, ...args)
      } else if (level === 'warn') {
        console.warn(logMessage, ...args)
      } else if (level === 'debug') {
        console.debug(logMessage, ...args)
      } else {
        console.log(logMessage, ...args)
      }
      return
    }

    try {
      if (level === 'error') {
        this.pino.error({ err: args[0], args: args.slice(1) }, message)
      } else {
        this.pino[level]({ args }, message)
      }
    } catch (error) {
      console.error(`[logger] failed to write ${level} line: ${message}`, error)
    }
  }
}

export const logger = new LoggerProvider()
