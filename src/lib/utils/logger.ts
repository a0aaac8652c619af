export interface CalibrationLogger {
  debug(...args: unknown[]): void
  info(...args: unknown[]): void
  warn(...args: unknown[]): void
  error(...args: unknown[]): void
}

class Logger implements CalibrationLogger {
  private isDev = process.env.NODE_ENV === 'development' || process.env.LOG_LEVEL === 'debug'

  constructor(private readonly scope?: string) {}

  private prefix(level: string): string {
    return this.scope ? `[${level}] [${this.scope}]` : `[${level}]`
  }

  debug(...args: unknown[]): void {
    if (this.isDev) {
      console.debug(this.prefix('DEBUG'), ...args)
    }
  }

  info(...args: unknown[]): void {
    console.info(this.prefix('INFO'), ...args)
  }

  warn(...args: unknown[]): void {
    console.warn(this.prefix('WARN'), ...args)
  }

  error(...args: unknown[]): void {
    console.error(this.prefix('ERROR'), ...args)
  }

  child(scope: string): Logger {
    return new Logger(this.scope ? `${this.scope}:${scope}` : scope)
  }
}

export const logger = new Logger()

export function createLogger(scope: string): Logger {
  return logger.child(scope)
}
