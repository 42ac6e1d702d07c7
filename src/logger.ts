/* eslint-disable no-console */
import pc from 'picocolors'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

export interface Logger {
  debug(message: string, ...details: unknown[]): void
  info(message: string, ...details: unknown[]): void
  warn(message: string, ...details: unknown[]): void
  error(message: string, ...details: unknown[]): void
}

export interface LoggerOptions {
  level?: LogLevel
  /** Prepended to every line, e.g. a device id */
  prefix?: string
  colors?: boolean
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
}

/**
 * Console-backed logger with level filtering.
 * info/debug go to stdout, warn/error to stderr.
 */
export class ConsoleLogger implements Logger {
  private level: LogLevel
  private readonly prefix?: string
  private readonly colors: boolean

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info'
    this.prefix = options.prefix
    this.colors = options.colors ?? pc.isColorSupported
  }

  setLevel(level: LogLevel): void {
    this.level = level
  }

  getLevel(): LogLevel {
    return this.level
  }

  debug(message: string, ...details: unknown[]): void {
    if (this.enabled('debug')) console.log(this.format('debug', message), ...details)
  }

  info(message: string, ...details: unknown[]): void {
    if (this.enabled('info')) console.log(this.format('info', message), ...details)
  }

  warn(message: string, ...details: unknown[]): void {
    if (this.enabled('warn')) console.error(this.format('warn', message), ...details)
  }

  error(message: string, ...details: unknown[]): void {
    if (this.enabled('error')) console.error(this.format('error', message), ...details)
  }

  private enabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level]
  }

  private format(level: Exclude<LogLevel, 'silent'>, message: string): string {
    const tag = this.tag(level)
    return this.prefix ? `${tag} [${this.prefix}] ${message}` : `${tag} ${message}`
  }

  private tag(level: Exclude<LogLevel, 'silent'>): string {
    const label = level.toUpperCase().padEnd(5)
    if (!this.colors) return label

    switch (level) {
      case 'debug':
        return pc.gray(label)
      case 'info':
        return pc.cyan(label)
      case 'warn':
        return pc.yellow(label)
      case 'error':
        return pc.red(label)
    }
  }
}

export function createLogger(options?: LoggerOptions): ConsoleLogger {
  return new ConsoleLogger(options)
}

function levelFromEnv(): LogLevel {
  const value = process.env.EDGEBENCH_LOG_LEVEL?.toLowerCase()
  if (value === 'debug' || value === 'info' || value === 'warn' || value === 'error' || value === 'silent') {
    return value
  }
  return 'info'
}

/** Process-wide default used by the CLI and as a fallback by core components */
export const logger = createLogger({ level: levelFromEnv() })

/** Logger that drops everything; handy for tests and quiet programmatic runs */
export const silentLogger: Logger = createLogger({ level: 'silent' })
