/* eslint-disable no-console */
import { ConfigLoadError, ConfigValidationError } from '../core/config'
import { InvalidMatrixError } from '../core/errors'
import type { CommandIO } from './types'

export function consoleIO(): CommandIO {
  return {
    cwd: process.cwd(),
    out: (line) => console.log(line),
    err: (line) => console.error(line),
  }
}

/**
 * Prints a readable explanation of a failure and returns the exit code
 */
export function reportError(error: unknown, io: CommandIO): number {
  if (error instanceof ConfigLoadError) {
    io.err('✗ Failed to load configuration:')
    io.err(error.message)
  } else if (error instanceof ConfigValidationError) {
    io.err('✗ Configuration validation failed:')
    io.err(error.getErrorSummary())
  } else if (error instanceof InvalidMatrixError) {
    io.err('✗ Invalid run matrix:')
    for (const problem of error.problems) {
      io.err(`  • ${problem}`)
    }
  } else {
    io.err(`✗ Unexpected error: ${error instanceof Error ? error.message : String(error)}`)
  }
  return 1
}

/**
 * Sets the process exit code. Left alone under test so a failing command
 * does not fail the test runner itself.
 */
export function setExitCode(code: number): void {
  if (code !== 0 && process.env.NODE_ENV !== 'test') {
    process.exitCode = code
  }
}
