/**
 * Core module - contains fundamental types, interfaces, and utilities
 * Used by all other modules for shared functionality
 */

export * from './types'
export * from './config'
export * from './errors'
export * from './matrix'
export * from './command-builder'
export * from './scheduler'
export * from './driver'
export * from './runner'
