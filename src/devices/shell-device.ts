import { BenchError, DeviceUnreachableError } from '../core/errors'
import type { CommandResult, DeviceInfo, ShellDeviceTarget } from '../core/types'
import { RemoteDevice, RemoteDeviceOptions } from './remote-device'
import { assertSafeRemotePath } from './quote'

// ssh reserves 255 for its own failures
const SSH_FAILURE_EXIT = 255

const PROBE_SCRIPT = 'uname -s; uname -r; uname -m; hostname; nproc; grep MemTotal /proc/meminfo'

/**
 * Parses the probe script output, one fact per line in script order
 */
export function parseProbeOutput(id: string, output: string): DeviceInfo {
  const [os, kernel, arch, hostname, cores, memLine] = output.split(/\r?\n/).map((line) => line.trim())
  const cpuCores = cores ? parseInt(cores, 10) : NaN
  const memory = memLine ? /MemTotal:\s*(\d+)\s*kB/i.exec(memLine) : null

  return {
    id,
    kind: 'shell',
    os: os ? os.toLowerCase() : undefined,
    kernel: kernel || undefined,
    arch: arch || undefined,
    hostname: hostname || undefined,
    cpuCores: Number.isFinite(cpuCores) ? cpuCores : undefined,
    memoryKb: memory?.[1] ? parseInt(memory[1], 10) : undefined,
  }
}

/**
 * Linux host reached with ssh; files travel with scp
 */
export class ShellDevice extends RemoteDevice {
  readonly kind = 'shell'

  constructor(
    private readonly target: ShellDeviceTarget,
    options: RemoteDeviceOptions = {},
  ) {
    super(target.id, options)
  }

  async info(): Promise<DeviceInfo> {
    const result = await this.checked(['sh', '-c', PROBE_SCRIPT])
    return parseProbeOutput(this.id, result.stdout)
  }

  protected shellTransport(line: string) {
    return {
      file: this.target.sshPath,
      args: [...this.connectionArgs('-p'), `${this.target.user}@${this.target.host}`, line],
    }
  }

  protected pushTransport(local: string, remote: string) {
    return {
      file: this.target.scpPath,
      args: [...this.connectionArgs('-P'), '-r', local, this.remoteSpec(remote)],
    }
  }

  protected pullTransport(remote: string, local: string) {
    return {
      file: this.target.scpPath,
      args: [...this.connectionArgs('-P'), '-r', this.remoteSpec(remote), local],
    }
  }

  protected classifyTransportFailure(result: CommandResult): BenchError | undefined {
    if (result.exitCode === SSH_FAILURE_EXIT) {
      return new DeviceUnreachableError(
        this.id,
        `ssh to ${this.target.user}@${this.target.host}:${this.target.port} failed: ${result.stderr.trim()}`,
      )
    }
    return undefined
  }

  // ssh takes the port as -p, scp as -P
  private connectionArgs(portFlag: '-p' | '-P'): string[] {
    const args = [portFlag, String(this.target.port), '-o', 'BatchMode=yes']
    if (this.target.keyPath) {
      args.push('-i', this.target.keyPath)
    }
    for (const option of this.target.sshOptions) {
      args.push('-o', option)
    }
    return args
  }

  private remoteSpec(path: string): string {
    return `${this.target.user}@${this.target.host}:${assertSafeRemotePath(path)}`
  }
}
