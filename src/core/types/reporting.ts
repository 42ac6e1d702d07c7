import type { FailureKind } from '../errors'
import type { DeviceInfo } from './device'
import type { ExecutionOutcome } from './execution'
import type { InvocationSpec, TerminalState } from './invocation'
import type { MetricsRecord } from './metrics'
import type { ProjectConfig } from './bench-config'

export interface FailureInfo {
  kind: FailureKind
  message: string
}

/**
 * What the execution driver produced for one invocation
 */
export interface InvocationResult {
  readonly spec: InvocationSpec
  readonly state: TerminalState
  readonly outcome: ExecutionOutcome
  readonly metrics: MetricsRecord
  readonly failure?: FailureInfo
  readonly temperatureC?: number
  readonly startedAt: Date
  readonly finishedAt: Date
}

/**
 * Final, frozen record of one invocation on one device
 */
export interface ResultRecord extends InvocationResult {
  readonly index: number
  readonly device?: DeviceInfo
}

export interface RunManifest {
  runId: string
  project: ProjectConfig
  startedAt: Date
  finishedAt: Date
  durationMs: number
  expectedInvocations: number
  recordedInvocations: number
  succeeded: number
  failed: number
  timedOut: number
  cancelled: boolean
  devices: DeviceInfo[]
}

// Statistics across the repeats of one matrix combination
export interface RepeatSummary {
  key: string
  deviceId: string
  modelId: string
  threads: number
  streams: number
  precision: string
  batch: number
  repeats: number
  succeeded: number
  throughputFps?: {
    mean: number
    median: number
    min: number
    max: number
  }
  latencyMedianMs?: number
  latencyAvgMs?: number
}

export interface RunSummary {
  records: ResultRecord[]
  manifest: RunManifest
  aggregates: RepeatSummary[]
  passed: boolean
}
