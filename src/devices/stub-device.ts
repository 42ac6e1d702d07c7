import { basename } from 'path'
import { DeviceUnreachableError } from '../core/errors'
import type { CommandResult, DeviceInfo } from '../core/types'
import type { DeviceHandle, ShellOptions } from './device'

export type StubOperation =
  | { op: 'push'; local: string; remote: string }
  | { op: 'pull'; remote: string; local: string }
  | { op: 'shell'; argv: string[]; cwd?: string; env?: Record<string, string> }
  | { op: 'exists'; path: string; result: boolean }
  | { op: 'mkdir'; path: string }
  | { op: 'remove'; path: string }
  | { op: 'info' }

export type StubResponder = (
  argv: readonly string[],
  options: ShellOptions,
  device: StubDevice,
) => CommandResult | Promise<CommandResult>

export interface StubDeviceOptions {
  info?: Partial<Omit<DeviceInfo, 'id' | 'kind'>>
  /** Handles every shell command; defaults to synthetic benchmark output */
  responder?: StubResponder
  /** Readings returned in turn by temperature(); the last one repeats */
  temperatures?: number[]
  tuning?: string[][]
}

/**
 * Output shaped like a real benchmark report, derived from the flags so
 * different matrix points produce different numbers
 */
export function syntheticBenchmarkOutput(argv: readonly string[]): string {
  const flag = (name: string, fallback: number) => {
    const position = argv.indexOf(name)
    const value = position >= 0 ? Number(argv[position + 1]) : NaN
    return Number.isFinite(value) ? value : fallback
  }

  const threads = flag('-nthreads', 1)
  const streams = flag('-nstreams', 1)
  const batch = flag('-b', 1)
  const iterations = flag('-niter', 100)

  const median = Math.round((40 / threads + 2 * streams) * batch * 100) / 100
  const throughput = Math.round(((1000 / median) * streams * batch) * 100) / 100
  const duration = Math.round((iterations * median) / streams)

  return [
    '[Step 11/11] Dumping statistics report',
    `[ INFO ] Count:            ${iterations} iterations`,
    `[ INFO ] Duration:         ${duration.toFixed(2)} ms`,
    '[ INFO ] Latency:',
    `[ INFO ]    Median:        ${median.toFixed(2)} ms`,
    `[ INFO ]    Average:       ${(median * 1.05).toFixed(2)} ms`,
    `[ INFO ]    Min:           ${(median * 0.9).toFixed(2)} ms`,
    `[ INFO ]    Max:           ${(median * 1.4).toFixed(2)} ms`,
    `[ INFO ] Throughput:   ${throughput.toFixed(2)} FPS`,
    '',
  ].join('\n')
}

const defaultResponder: StubResponder = (argv) =>
  argv.includes('-m') ? { exitCode: 0, stdout: syntheticBenchmarkOutput(argv), stderr: '' } : { exitCode: 0, stdout: '', stderr: '' }

/**
 * In-memory device. Keeps a flat filesystem of paths, records every
 * operation and answers shell commands through a responder.
 */
export class StubDevice implements DeviceHandle {
  readonly kind = 'stub'
  readonly operations: StubOperation[] = []

  private readonly files = new Set<string>()
  private readonly infoOverrides: StubDeviceOptions['info']
  private readonly temperatures: number[]
  private readonly tuning: string[][]
  private responder: StubResponder
  private reachable = true

  constructor(
    readonly id: string,
    options: StubDeviceOptions = {},
  ) {
    this.infoOverrides = options.info
    this.responder = options.responder ?? defaultResponder
    this.temperatures = [...(options.temperatures ?? [])]
    this.tuning = options.tuning ?? []
  }

  setResponder(responder: StubResponder): void {
    this.responder = responder
  }

  /** An unreachable stub fails every operation with DeviceUnreachableError */
  setReachable(reachable: boolean): void {
    this.reachable = reachable
  }

  /** Remote paths currently present, sorted */
  listFiles(prefix = '/'): string[] {
    return [...this.files].filter((path) => path === prefix || path.startsWith(withSlash(prefix))).sort()
  }

  hasFile(path: string): boolean {
    return this.files.has(normalize(path))
  }

  async push(local: string, remote: string): Promise<void> {
    this.ensureReachable()
    this.operations.push({ op: 'push', local, remote })
    // a trailing slash means "into this directory", as adb push and scp do
    this.addPath(remote.endsWith('/') ? normalize(`${remote}${basename(local)}`) : normalize(remote))
  }

  async pull(remote: string, local: string): Promise<void> {
    this.ensureReachable()
    this.operations.push({ op: 'pull', remote, local })
  }

  async shell(argv: readonly string[], options: ShellOptions): Promise<CommandResult> {
    this.ensureReachable()
    this.operations.push({ op: 'shell', argv: [...argv], cwd: options.cwd, env: options.env })
    return this.responder(argv, options, this)
  }

  async exists(path: string): Promise<boolean> {
    this.ensureReachable()
    const result = this.files.has(normalize(path))
    this.operations.push({ op: 'exists', path, result })
    return result
  }

  async mkdir(path: string): Promise<void> {
    this.ensureReachable()
    this.operations.push({ op: 'mkdir', path })
    this.addPath(normalize(path))
  }

  async remove(path: string): Promise<void> {
    this.ensureReachable()
    this.operations.push({ op: 'remove', path })
    const target = normalize(path)
    for (const file of [...this.files]) {
      if (file === target || file.startsWith(withSlash(target))) {
        this.files.delete(file)
      }
    }
  }

  async info(): Promise<DeviceInfo> {
    this.ensureReachable()
    this.operations.push({ op: 'info' })
    return { os: 'stub', ...this.infoOverrides, id: this.id, kind: this.kind }
  }

  async temperature(): Promise<number | undefined> {
    this.ensureReachable()
    if (this.temperatures.length > 1) {
      return this.temperatures.shift()
    }
    return this.temperatures[0]
  }

  tuningCommands(): string[][] {
    return this.tuning.map((command) => [...command])
  }

  private addPath(path: string): void {
    // register parents so prefix listings and exists() behave like a tree
    const parts = path.split('/').filter(Boolean)
    for (let i = 1; i <= parts.length; i++) {
      this.files.add(`/${parts.slice(0, i).join('/')}`)
    }
  }

  private ensureReachable(): void {
    if (!this.reachable) {
      throw new DeviceUnreachableError(this.id)
    }
  }
}

function normalize(path: string): string {
  const trimmed = path.replace(/\/+/g, '/').replace(/\/$/, '')
  return trimmed.startsWith('/') ? trimmed : `/${trimmed}`
}

function withSlash(path: string): string {
  const normalized = normalize(path)
  return normalized === '/' ? '/' : `${normalized}/`
}
