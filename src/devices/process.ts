import { spawn } from 'child_process'
import { constants } from 'os'
import { CommandTimeoutError } from '../core/errors'
import type { CommandResult } from '../core/types'

export interface RunProcessOptions {
  timeoutMs: number
  input?: string
  env?: NodeJS.ProcessEnv
}

const SIGNAL_NUMBERS = new Map<string, number>(Object.entries(constants.signals))

/** Shell convention: a child killed by signal N exits with 128 + N */
export function exitCodeFor(code: number | null, signal: NodeJS.Signals | null): number {
  if (code !== null) return code
  if (signal === null) return 1
  return 128 + (SIGNAL_NUMBERS.get(signal) ?? 0)
}

export class ProcessSpawnError extends Error {
  constructor(
    public readonly file: string,
    public readonly cause?: Error,
  ) {
    super(`Failed to start ${file}: ${cause?.message ?? 'unknown error'}`)
    this.name = 'ProcessSpawnError'
  }
}

/**
 * Runs a local executable with an argv array (never through a shell) and
 * collects its output. On timeout the child is killed and the promise rejects
 * with CommandTimeoutError carrying whatever output arrived so far.
 */
export function runProcess(file: string, args: readonly string[], options: RunProcessOptions): Promise<CommandResult> {
  return new Promise<CommandResult>((resolve, reject) => {
    let stdout = ''
    let stderr = ''
    let settled = false

    const child = spawn(file, [...args], {
      stdio: ['pipe', 'pipe', 'pipe'],
      env: options.env ?? process.env,
    })

    const finish = (fn: () => void) => {
      if (settled) return
      settled = true
      clearTimeout(timer)
      fn()
    }

    const timer = setTimeout(() => {
      child.kill('SIGKILL')
      finish(() => reject(new CommandTimeoutError([file, ...args].join(' '), options.timeoutMs, stdout, stderr)))
    }, options.timeoutMs)

    child.stdout?.on('data', (data: Buffer) => {
      stdout += data.toString()
    })

    child.stderr?.on('data', (data: Buffer) => {
      stderr += data.toString()
    })

    child.once('error', (error) => {
      finish(() => reject(new ProcessSpawnError(file, error)))
    })

    child.once('close', (code, signal) => {
      finish(() =>
        resolve({
          exitCode: exitCodeFor(code, signal),
          stdout,
          stderr,
        }),
      )
    })

    if (options.input !== undefined) {
      child.stdin?.end(options.input)
    } else {
      child.stdin?.end()
    }
  })
}
