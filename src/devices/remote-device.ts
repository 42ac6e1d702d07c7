import { BenchError, DeviceUnreachableError, ProcessError } from '../core/errors'
import type { CommandResult, DeviceInfo, DeviceKind } from '../core/types'
import type { Logger } from '../logger'
import { logger as defaultLogger } from '../logger'
import type { DeviceHandle, ShellOptions } from './device'
import { ProcessSpawnError, runProcess } from './process'
import { buildRemoteLine, quoteArg } from './quote'

export const EXIT_MARKER = '__EDGEBENCH_EXIT__'

const THERMAL_ZONE = '/sys/class/thermal/thermal_zone0/temp'

export interface RemoteDeviceOptions {
  /** Timeout for housekeeping commands such as mkdir or test */
  commandTimeoutMs?: number
  /** Timeout for push and pull */
  transferTimeoutMs?: number
  logger?: Logger
}

/**
 * Strips the exit-code marker appended to every remote line.
 * Returns undefined for the code when the marker never arrived.
 */
export function splitExitMarker(stdout: string): { stdout: string; exitCode?: number } {
  const pattern = new RegExp(`(?:\\r?\\n)?${EXIT_MARKER}(\\d+)\\s*$`)
  const match = pattern.exec(stdout)
  if (!match?.[1]) {
    return { stdout }
  }
  return { stdout: stdout.slice(0, match.index), exitCode: parseInt(match[1], 10) }
}

/**
 * Common ground for devices reached through a local transport binary (adb, ssh).
 * Subclasses supply the transport argv and classify transport failures;
 * everything else is expressed as remote shell commands.
 */
export abstract class RemoteDevice implements DeviceHandle {
  abstract readonly kind: DeviceKind

  protected readonly commandTimeoutMs: number
  protected readonly transferTimeoutMs: number
  protected readonly logger: Logger

  constructor(
    readonly id: string,
    options: RemoteDeviceOptions = {},
  ) {
    this.commandTimeoutMs = options.commandTimeoutMs ?? 30000
    this.transferTimeoutMs = options.transferTimeoutMs ?? 300000
    this.logger = options.logger ?? defaultLogger
  }

  /** Local binary and argv that execute `line` on the device */
  protected abstract shellTransport(line: string): { file: string; args: string[] }
  protected abstract pushTransport(local: string, remote: string): { file: string; args: string[] }
  protected abstract pullTransport(remote: string, local: string): { file: string; args: string[] }

  /**
   * Maps a failed transport run (no exit marker seen, or a failed transfer)
   * onto the error taxonomy. Returning undefined means the failure is the
   * command's own.
   */
  protected abstract classifyTransportFailure(result: CommandResult): BenchError | undefined

  abstract info(): Promise<DeviceInfo>

  async shell(argv: readonly string[], options: ShellOptions): Promise<CommandResult> {
    const line = `${buildRemoteLine(argv, { cwd: options.cwd, env: options.env })}; echo ${EXIT_MARKER}$?`
    const { file, args } = this.shellTransport(line)

    this.logger.debug(`[${this.id}] $ ${line}`)
    const result = await this.runTransport(file, args, options.timeoutMs)
    const { stdout, exitCode } = splitExitMarker(result.stdout)

    if (exitCode !== undefined) {
      return { exitCode, stdout, stderr: result.stderr }
    }

    const failure = this.classifyTransportFailure(result)
    if (failure) {
      throw failure
    }

    return { exitCode: result.exitCode, stdout, stderr: result.stderr }
  }

  async push(local: string, remote: string): Promise<void> {
    const { file, args } = this.pushTransport(local, remote)
    this.logger.debug(`[${this.id}] push ${local} -> ${remote}`)
    await this.transfer(file, args, `push ${local} -> ${remote}`)
  }

  async pull(remote: string, local: string): Promise<void> {
    const { file, args } = this.pullTransport(remote, local)
    this.logger.debug(`[${this.id}] pull ${remote} -> ${local}`)
    await this.transfer(file, args, `pull ${remote} -> ${local}`)
  }

  async exists(path: string): Promise<boolean> {
    const result = await this.shell(['test', '-e', path], { timeoutMs: this.commandTimeoutMs })
    return result.exitCode === 0
  }

  async mkdir(path: string): Promise<void> {
    await this.checked(['mkdir', '-p', path])
  }

  async remove(path: string): Promise<void> {
    await this.checked(['rm', '-rf', path])
  }

  async temperature(): Promise<number | undefined> {
    const result = await this.shell(['cat', THERMAL_ZONE], { timeoutMs: this.commandTimeoutMs })
    if (result.exitCode !== 0) {
      this.logger.debug(`[${this.id}] no thermal zone at ${THERMAL_ZONE}`)
      return undefined
    }

    const milli = parseInt(result.stdout.trim(), 10)
    return Number.isFinite(milli) ? milli / 1000 : undefined
  }

  /** Runs argv and throws ProcessError on a non-zero exit */
  protected async checked(argv: string[]): Promise<CommandResult> {
    const result = await this.shell(argv, { timeoutMs: this.commandTimeoutMs })
    if (result.exitCode !== 0) {
      throw new ProcessError(
        `${argv.map(quoteArg).join(' ')} failed on ${this.id} with exit code ${result.exitCode}: ${result.stderr.trim()}`,
        result.exitCode,
        result.stderr,
      )
    }
    return result
  }

  private async transfer(file: string, args: string[], description: string): Promise<void> {
    const result = await this.runTransport(file, args, this.transferTimeoutMs)
    if (result.exitCode === 0) return

    const failure = this.classifyTransportFailure(result)
    if (failure) {
      throw failure
    }

    throw new ProcessError(
      `${description} failed on ${this.id} with exit code ${result.exitCode}: ${result.stderr.trim()}`,
      result.exitCode,
      result.stderr,
    )
  }

  private async runTransport(file: string, args: string[], timeoutMs: number): Promise<CommandResult> {
    try {
      return await runProcess(file, args, { timeoutMs })
    } catch (error) {
      if (error instanceof ProcessSpawnError) {
        throw new DeviceUnreachableError(this.id, `Cannot reach ${this.id}: ${error.message}`, error)
      }
      throw error
    }
  }
}
