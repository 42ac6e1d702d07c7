import type { FailureKind } from '../errors'

export type ExecutionStatus = 'success' | 'timeout' | 'process-error' | 'device-unreachable'

export interface AttemptRecord {
  attempt: number
  status: ExecutionStatus
  exitCode?: number
  durationMs: number
  startedAt: Date
  message?: string
}

export interface ExecutionOutcome {
  status: ExecutionStatus
  exitCode?: number
  stdout: string
  stderr: string
  durationMs: number
  /** Total attempts made, including the final one */
  attempts: number
  /** Earlier attempts, oldest first; the final attempt is the outcome itself */
  attemptLog: AttemptRecord[]
  command?: string[]
  error?: {
    kind: FailureKind
    message: string
  }
}

export interface CommandResult {
  exitCode: number
  stdout: string
  stderr: string
}
