import { BenchError, DeviceNotFoundError, DeviceUnreachableError, ProcessError } from '../core/errors'
import type { BridgeDeviceTarget, CommandResult, DeviceInfo } from '../core/types'
import { RemoteDevice, RemoteDeviceOptions } from './remote-device'

const NOT_FOUND_PATTERNS = [/device '[^']*' not found/i, /device not found/i]
const UNREACHABLE_PATTERNS = [
  /device offline/i,
  /device unauthorized/i,
  /no devices\/emulators found/i,
  /cannot connect/i,
  /connection reset/i,
  /error: closed/i,
]

const GETPROP_LINE = /^\[([^\]]+)\]:\s*\[(.*)\]\s*$/

/**
 * Parses `getprop` output (`[key]: [value]` per line) into a map
 */
export function parseGetprop(output: string): Map<string, string> {
  const props = new Map<string, string>()
  for (const line of output.split(/\r?\n/)) {
    const match = GETPROP_LINE.exec(line.trim())
    if (match?.[1] !== undefined && match[2] !== undefined) {
      props.set(match[1], match[2])
    }
  }
  return props
}

/**
 * Android target reached over USB (or TCP) through the adb debug bridge
 */
export class BridgeDevice extends RemoteDevice {
  readonly kind = 'bridge'

  private readonly serial: string
  private readonly adbPath: string

  constructor(target: BridgeDeviceTarget, options: RemoteDeviceOptions = {}) {
    super(target.id, options)
    this.serial = target.serial ?? target.id
    this.adbPath = target.adbPath
  }

  async info(): Promise<DeviceInfo> {
    const result = await this.checked(['getprop'])
    const props = parseGetprop(result.stdout)
    const value = (key: string) => {
      const found = props.get(key)
      return found ? found : undefined
    }

    return {
      id: this.id,
      kind: this.kind,
      model: value('ro.product.model'),
      manufacturer: value('ro.product.manufacturer'),
      os: 'android',
      osVersion: value('ro.build.version.release'),
      sdkVersion: value('ro.build.version.sdk'),
      abi: value('ro.product.cpu.abi'),
    }
  }

  tuningCommands(): string[][] {
    return [
      ['settings', 'put', 'global', 'window_animation_scale', '0'],
      ['settings', 'put', 'global', 'transition_animation_scale', '0'],
      ['settings', 'put', 'global', 'animator_duration_scale', '0'],
      // screen off
      ['input', 'keyevent', 'KEYCODE_POWER'],
    ]
  }

  protected shellTransport(line: string) {
    return { file: this.adbPath, args: ['-s', this.serial, 'shell', line] }
  }

  protected pushTransport(local: string, remote: string) {
    return { file: this.adbPath, args: ['-s', this.serial, 'push', local, remote] }
  }

  protected pullTransport(remote: string, local: string) {
    return { file: this.adbPath, args: ['-s', this.serial, 'pull', remote, local] }
  }

  protected classifyTransportFailure(result: CommandResult): BenchError | undefined {
    const output = `${result.stderr}\n${result.stdout}`

    if (NOT_FOUND_PATTERNS.some((pattern) => pattern.test(output))) {
      return new DeviceNotFoundError(this.id, `adb reports device '${this.serial}' not found`)
    }

    if (UNREACHABLE_PATTERNS.some((pattern) => pattern.test(output))) {
      return new DeviceUnreachableError(this.id, `adb cannot reach ${this.serial}: ${result.stderr.trim()}`)
    }

    if (result.exitCode !== 0) {
      return new ProcessError(
        `adb exited with code ${result.exitCode} for ${this.serial}: ${result.stderr.trim()}`,
        result.exitCode,
        result.stderr,
      )
    }

    return undefined
  }
}
