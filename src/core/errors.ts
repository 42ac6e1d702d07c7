export type FailureKind =
  | 'DeviceNotFound'
  | 'DeviceUnreachable'
  | 'Timeout'
  | 'ProcessError'
  | 'ParseFailure'
  | 'InvalidMatrix'

/**
 * Base class for every failure the engine classifies
 */
export abstract class BenchError extends Error {
  abstract readonly kind: FailureKind

  constructor(
    message: string,
    public readonly cause?: Error,
  ) {
    super(message)
    this.name = new.target.name
  }
}

export class DeviceNotFoundError extends BenchError {
  readonly kind = 'DeviceNotFound'

  constructor(
    public readonly deviceId: string,
    message = `Device not found: ${deviceId}`,
    cause?: Error,
  ) {
    super(message, cause)
  }
}

export class DeviceUnreachableError extends BenchError {
  readonly kind = 'DeviceUnreachable'

  constructor(
    public readonly deviceId: string,
    message = `Device unreachable: ${deviceId}`,
    cause?: Error,
  ) {
    super(message, cause)
  }
}

export class CommandTimeoutError extends BenchError {
  readonly kind = 'Timeout'

  constructor(
    public readonly command: string,
    public readonly timeoutMs: number,
    public readonly stdout = '',
    public readonly stderr = '',
  ) {
    super(`Command timed out after ${timeoutMs}ms: ${command}`)
  }
}

export class ProcessError extends BenchError {
  readonly kind = 'ProcessError'

  constructor(
    message: string,
    public readonly exitCode?: number,
    public readonly stderr = '',
    cause?: Error,
  ) {
    super(message, cause)
  }
}

export class ParseFailureError extends BenchError {
  readonly kind = 'ParseFailure'
}

export class InvalidMatrixError extends BenchError {
  readonly kind = 'InvalidMatrix'

  constructor(
    message: string,
    public readonly problems: string[] = [message],
  ) {
    super(message)
  }
}

export function isBenchError(error: unknown): error is BenchError {
  return error instanceof BenchError
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error))
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
