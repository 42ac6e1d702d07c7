import type { DeviceTarget } from '../core/types'
import type { Logger } from '../logger'
import { BridgeDevice } from './bridge-device'
import type { DeviceHandle } from './device'
import type { DeviceFactory } from './device-pool'
import { ShellDevice } from './shell-device'
import { StubDevice } from './stub-device'

export interface DeviceFactoryOptions {
  logger?: Logger
  /** Build StubDevices regardless of kind, for dry runs */
  dryRun?: boolean
}

export function createDevice(target: DeviceTarget, options: DeviceFactoryOptions = {}): DeviceHandle {
  if (options.dryRun) {
    return new StubDevice(target.id)
  }

  switch (target.kind) {
    case 'bridge':
      return new BridgeDevice(target, { logger: options.logger })
    case 'shell':
      return new ShellDevice(target, { logger: options.logger })
    case 'stub':
      return new StubDevice(target.id)
  }
}

export function createDeviceFactory(options: DeviceFactoryOptions = {}): DeviceFactory {
  return (target) => createDevice(target, options)
}
