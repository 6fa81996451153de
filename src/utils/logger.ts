const isDebugEnabled = (): boolean => {
  const flag = process.env.RB_DEBUG?.trim().toLowerCase()
  return flag === '1' || flag === 'true'
}

class Logger {
  private isDebug = isDebugEnabled()

  constructor(private readonly scope: string) { }

  debug(...args: unknown[]): void {
    if (this.isDebug) {
      console.debug('[DEBUG]', `[${this.scope}]`, ...args)
    }
  }

  info(...args: unknown[]): void {
    console.info('[INFO]', `[${this.scope}]`, ...args)
  }

  warn(...args: unknown[]): void {
    console.warn('[WARN]', `[${this.scope}]`, ...args)
  }

  error(...args: unknown[]): void {
    console.error('[ERROR]', `[${this.scope}]`, ...args)
  }
}

export type { Logger }

export function createLogger(scope: string): Logger {
  return new Logger(scope)
}
