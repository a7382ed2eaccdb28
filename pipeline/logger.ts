/**
 * Scoped console logger for pipeline stages and scripts.
 *
 * Output is prefixed with `[ETL:<scope>]`. Debug lines only appear at the
 * `debug` level, which `--verbose` or `ETL_LOG_LEVEL=debug` selects.
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
}

export interface Logger {
  debug(message: string): void
  info(message: string): void
  warn(message: string): void
  error(message: string, error?: unknown): void
  child(scope: string): Logger
}

export class EtlLogger implements Logger {
  constructor(
    private scope: string,
    private level: LogLevel = 'info'
  ) {}

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level]
  }

  private prefix(tag?: string): string {
    return tag ? `[ETL:${this.scope}:${tag}]` : `[ETL:${this.scope}]`
  }

  debug(message: string): void {
    if (this.enabled('debug')) {
      console.log(`${this.prefix('DEBUG')} ${message}`)
    }
  }

  info(message: string): void {
    if (this.enabled('info')) {
      console.log(`${this.prefix()} ${message}`)
    }
  }

  warn(message: string): void {
    if (this.enabled('warn')) {
      console.warn(`${this.prefix('WARN')} ${message}`)
    }
  }

  error(message: string, error?: unknown): void {
    if (!this.enabled('error')) return
    console.error(`${this.prefix('ERROR')} ${message}`)
    // stack only at debug level
    if (error !== undefined && this.enabled('debug')) {
      console.error(error)
    }
  }

  child(scope: string): Logger {
    return new EtlLogger(`${this.scope}:${scope}`, this.level)
  }
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value)
}

export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  const normalized = value?.trim().toLowerCase()
  return normalized !== undefined && isLogLevel(normalized) ? normalized : fallback
}

export function createLogger(scope: string, level?: LogLevel): Logger {
  return new EtlLogger(scope, level ?? parseLogLevel(process.env.ETL_LOG_LEVEL))
}

export const silentLogger: Logger = new EtlLogger('silent', 'silent')
