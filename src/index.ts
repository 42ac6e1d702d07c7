export { run, defineConfig } from './edgebench'
export type { RunOptions } from './api'

export * from './core'
export * from './devices'
export * from './parsers'
export * from './reporting'
export { createLogger, ConsoleLogger, silentLogger, type Logger, type LogLevel, type LoggerOptions } from './logger'
