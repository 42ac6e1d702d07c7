import type { CommandResult, DeviceInfo, DeviceKind } from '../core/types'

export interface ShellOptions {
  timeoutMs: number
  cwd?: string
  env?: Record<string, string>
}

/**
 * Capability surface shared by every benchmark target.
 * Operations resolve only once the remote side has finished, failed or timed out.
 */
export interface DeviceHandle {
  readonly id: string
  readonly kind: DeviceKind

  push(local: string, remote: string): Promise<void>
  pull(remote: string, local: string): Promise<void>
  shell(argv: readonly string[], options: ShellOptions): Promise<CommandResult>
  exists(path: string): Promise<boolean>
  mkdir(path: string): Promise<void>
  remove(path: string): Promise<void>
  info(): Promise<DeviceInfo>

  /** Degrees Celsius, undefined when the device exposes no sensor */
  temperature?(): Promise<number | undefined>
  /** Commands that put the device into a steadier state before measuring */
  tuningCommands?(): string[][]
}
