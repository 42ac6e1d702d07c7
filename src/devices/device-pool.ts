import { DeviceNotFoundError, DeviceUnreachableError, errorMessage, toError } from '../core/errors'
import type { DeviceHealth, DeviceInfo, DeviceTarget } from '../core/types'
import type { Logger } from '../logger'
import { logger as defaultLogger } from '../logger'
import type { DeviceHandle } from './device'

export type DeviceFactory = (target: DeviceTarget) => DeviceHandle

export interface DevicePoolOptions {
  factory: DeviceFactory
  logger?: Logger
}

export type Release = () => void

interface DeviceEntry {
  target: DeviceTarget
  handle?: DeviceHandle
  info?: DeviceInfo
  health: DeviceHealth
  locked: boolean
  waiters: Array<() => void>
}

export interface DeviceHealthEntry {
  id: string
  health: DeviceHealth
  info?: DeviceInfo
}

/**
 * Owns one handle per configured device. Handles are built lazily and
 * probed on first resolve; each device can be held by one caller at a time.
 */
export class DevicePool {
  private readonly entries = new Map<string, DeviceEntry>()
  private readonly factory: DeviceFactory
  private readonly logger: Logger

  constructor(targets: readonly DeviceTarget[], options: DevicePoolOptions) {
    this.factory = options.factory
    this.logger = options.logger ?? defaultLogger

    for (const target of targets) {
      this.entries.set(target.id, { target, health: 'unknown', locked: false, waiters: [] })
    }
  }

  ids(): string[] {
    return [...this.entries.keys()]
  }

  has(id: string): boolean {
    return this.entries.has(id)
  }

  /**
   * Returns a probed handle. Probes again after markUnreachable().
   */
  async resolve(id: string): Promise<DeviceHandle> {
    const entry = this.entry(id)
    const handle = entry.handle ?? this.factory(entry.target)
    entry.handle = handle

    if (entry.health === 'reachable' && entry.info) {
      return handle
    }

    try {
      const info = await handle.info()
      entry.info = info
      entry.health = 'reachable'
      this.logger.debug(`Device ${id} is reachable (${info.model ?? info.os ?? entry.target.kind})`)
      return handle
    } catch (error) {
      if (error instanceof DeviceNotFoundError) {
        entry.health = 'not-found'
        throw error
      }

      entry.health = 'unreachable'
      if (error instanceof DeviceUnreachableError) {
        throw error
      }
      throw new DeviceUnreachableError(id, `Probe of ${id} failed: ${errorMessage(error)}`, toError(error))
    }
  }

  /** Cached DeviceInfo from the last successful probe */
  info(id: string): DeviceInfo | undefined {
    return this.entries.get(id)?.info
  }

  health(id: string): DeviceHealth {
    return this.entries.get(id)?.health ?? 'not-found'
  }

  healthReport(): DeviceHealthEntry[] {
    return [...this.entries.entries()].map(([id, entry]) => ({ id, health: entry.health, info: entry.info }))
  }

  markUnreachable(id: string): void {
    const entry = this.entries.get(id)
    if (!entry) return
    entry.health = 'unreachable'
    this.logger.warn(`Device ${id} marked unreachable`)
  }

  /**
   * Waits for exclusive use of a device. Waiters are served in arrival order.
   */
  async acquire(id: string): Promise<Release> {
    const entry = this.entry(id)

    const lease = (): Release => {
      let released = false
      return () => {
        if (released) return
        released = true
        const next = entry.waiters.shift()
        if (next) {
          next()
        } else {
          entry.locked = false
        }
      }
    }

    if (!entry.locked) {
      entry.locked = true
      return lease()
    }

    return new Promise<Release>((resolve) => {
      entry.waiters.push(() => resolve(lease()))
    })
  }

  async withDevice<T>(id: string, fn: (device: DeviceHandle) => Promise<T>): Promise<T> {
    const release = await this.acquire(id)
    try {
      const device = await this.resolve(id)
      return await fn(device)
    } finally {
      release()
    }
  }

  private entry(id: string): DeviceEntry {
    const entry = this.entries.get(id)
    if (!entry) {
      throw new DeviceNotFoundError(id, `Device "${id}" is not configured`)
    }
    return entry
  }
}
