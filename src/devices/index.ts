export type { DeviceHandle, ShellOptions } from './device'
export { RemoteDevice, splitExitMarker, EXIT_MARKER } from './remote-device'
export type { RemoteDeviceOptions } from './remote-device'
export { BridgeDevice, parseGetprop } from './bridge-device'
export { ShellDevice, parseProbeOutput } from './shell-device'
export { StubDevice, syntheticBenchmarkOutput } from './stub-device'
export type { StubDeviceOptions, StubOperation, StubResponder } from './stub-device'
export { DevicePool } from './device-pool'
export type { DeviceFactory, DevicePoolOptions, DeviceHealthEntry, Release } from './device-pool'
export { createDevice, createDeviceFactory } from './create-device'
export type { DeviceFactoryOptions } from './create-device'
export { runProcess, ProcessSpawnError } from './process'
export type { RunProcessOptions } from './process'
export { quoteArg, quoteArgs, buildRemoteLine, assertSafeRemotePath } from './quote'
