import { z } from 'zod'

const DeviceBaseSchema = z.object({
  id: z.string().min(1, 'Device id is required'),
  name: z.string().optional(),
  tags: z.array(z.string()).default([]),
})

// USB debug-bridge target driven through adb
export const BridgeDeviceSchema = DeviceBaseSchema.extend({
  kind: z.literal('bridge'),
  serial: z.string().min(1).optional(), // defaults to id
  adbPath: z.string().default('adb'),
})

// Host reachable over ssh; files travel with scp
export const ShellDeviceSchema = DeviceBaseSchema.extend({
  kind: z.literal('shell'),
  host: z.string().min(1, 'SSH host is required'),
  port: z.number().int().positive().default(22),
  user: z.string().min(1, 'SSH user is required'),
  keyPath: z.string().optional(),
  sshPath: z.string().default('ssh'),
  scpPath: z.string().default('scp'),
  sshOptions: z.array(z.string()).default([]),
})

// In-memory device, used for dry runs
export const StubDeviceSchema = DeviceBaseSchema.extend({
  kind: z.literal('stub'),
})

export const DeviceTargetSchema = z.discriminatedUnion('kind', [
  BridgeDeviceSchema,
  ShellDeviceSchema,
  StubDeviceSchema,
])

export type BridgeDeviceTarget = z.infer<typeof BridgeDeviceSchema>
export type ShellDeviceTarget = z.infer<typeof ShellDeviceSchema>
export type StubDeviceTarget = z.infer<typeof StubDeviceSchema>
export type DeviceTarget = z.infer<typeof DeviceTargetSchema>
export type DeviceKind = DeviceTarget['kind']

/**
 * Snapshot of what a device reported about itself when it was probed
 */
export interface DeviceInfo {
  id: string
  kind: DeviceKind
  model?: string
  manufacturer?: string
  os?: string
  osVersion?: string
  sdkVersion?: string
  abi?: string
  arch?: string
  kernel?: string
  hostname?: string
  cpuCores?: number
  memoryKb?: number
}

export type DeviceHealth = 'unknown' | 'reachable' | 'unreachable' | 'not-found'
