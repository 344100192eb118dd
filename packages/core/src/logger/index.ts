import pino from 'pino'

type LogLevel = 'info' | 'debug' | 'warn' | 'error'

/**
 * LoggerProvider is a class that provides logging functionality.
 * It is a wrapper around the pino logger.
 * It is a singleton class.
 * @description Call init() at the top of an entry point before relying on structured output.
 * Every level is written to stderr: stdout belongs to the guest program.
 */
export class LoggerProvider {
  private pino = pino(
    {
      level: process.env['PINO_LEVEL'] || 'info',
    },
    pino.destination({ dest: 2, sync: true }),
  )
  private hasBeenInitialized = false

  get level() {
    return this.pino.level
  }

  set level(level: string) {
    this.pino.level = level
  }

  init() {
    this.hasBeenInitialized = true
    this.pino.debug('LoggerProvider initialized')
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
   * Falls back to the console until init() has been called
   */
  private _safeLog(level: LogLevel, message: string, args: unknown[]) {
    if (!this.hasBeenInitialized) {
      if (!this.pino.isLevelEnabled(level)) return
      const timestamp = new Date().toISOString()
      const logMessage = `[${timestamp}] [${level.toUpperCase()}] ${message}`
      console.error(logMessage, ...args)
      return
    }

    if (level === 'error') {
      this.pino.error({ err: args[0], args: args.slice(1) }, message)
    } else {
      this.pino[level]({ args }, message)
    }
  }
}

export const logger = new LoggerProvider()
