import type {
  DeviceInfo,
  InvocationResult,
  ProjectConfig,
  RepeatSummary,
  ResultRecord,
  RunManifest,
  RunSummary,
} from '../core/types'
import { calculateMedian, summarize } from '../core/utils/statistics'

export interface ResultAggregatorOptions {
  project: ProjectConfig
  expectedInvocations: number
}

/**
 * Collects one frozen ResultRecord per invocation. Records may arrive in any
 * order across devices; reads always return them in expansion order.
 */
export class ResultAggregator {
  private readonly records: ResultRecord[] = []
  private readonly indices = new Set<number>()
  private readonly devices = new Map<string, DeviceInfo>()
  private readonly project: ProjectConfig
  private readonly expectedInvocations: number
  private runStartTime: Date
  private runEndTime?: Date
  private cancelled = false

  constructor(options: ResultAggregatorOptions) {
    this.project = options.project
    this.expectedInvocations = options.expectedInvocations
    this.runStartTime = new Date()
  }

  add(result: InvocationResult, device?: DeviceInfo): ResultRecord {
    if (this.indices.has(result.spec.index)) {
      throw new Error(`Invocation ${result.spec.index} (${result.spec.id}) was already recorded`)
    }

    if (device) {
      this.recordDevice(device)
    }

    const record: ResultRecord = Object.freeze({
      ...result,
      index: result.spec.index,
      device: device ? Object.freeze({ ...device }) : undefined,
      outcome: Object.freeze({ ...result.outcome, attemptLog: [...result.outcome.attemptLog] }),
      metrics: Object.freeze({ ...result.metrics }),
      failure: result.failure ? Object.freeze({ ...result.failure }) : undefined,
    })

    this.indices.add(record.index)
    this.records.push(record)
    return record
  }

  /** Remembers a device snapshot for the manifest, even if it produced no record */
  recordDevice(info: DeviceInfo): void {
    this.devices.set(info.id, info)
  }

  completeRun(cancelled = false): void {
    this.runEndTime = new Date()
    this.cancelled = cancelled
  }

  results(): ResultRecord[] {
    return [...this.records].sort((a, b) => a.index - b.index)
  }

  manifest(): RunManifest {
    const finishedAt = this.runEndTime ?? new Date()

    return {
      runId: this.project.runId,
      project: this.project,
      startedAt: this.runStartTime,
      finishedAt,
      durationMs: finishedAt.getTime() - this.runStartTime.getTime(),
      expectedInvocations: this.expectedInvocations,
      recordedInvocations: this.records.length,
      succeeded: this.count('succeeded'),
      failed: this.count('failed'),
      timedOut: this.count('timed-out'),
      cancelled: this.cancelled,
      devices: [...this.devices.values()].sort((a, b) => a.id.localeCompare(b.id)),
    }
  }

  summarizeRepeats(): RepeatSummary[] {
    return summarizeRepeats(this.results())
  }

  /**
   * A run passes when it was not cancelled and every expected invocation succeeded
   */
  getSummary(): RunSummary {
    const records = this.results()
    const passed =
      !this.cancelled &&
      this.expectedInvocations > 0 &&
      records.length === this.expectedInvocations &&
      records.every((record) => record.state === 'succeeded')

    return {
      records,
      manifest: this.manifest(),
      aggregates: summarizeRepeats(records),
      passed,
    }
  }

  get size(): number {
    return this.records.length
  }

  private count(state: ResultRecord['state']): number {
    return this.records.filter((record) => record.state === state).length
  }
}

/**
 * Groups records that differ only in their repeat index and computes
 * throughput statistics and median latencies over the successful ones
 */
export function summarizeRepeats(records: readonly ResultRecord[]): RepeatSummary[] {
  const groups = new Map<string, { first: ResultRecord; members: ResultRecord[] }>()

  for (const record of [...records].sort((a, b) => a.index - b.index)) {
    const key = combinationKey(record)
    const group = groups.get(key)
    if (group) {
      group.members.push(record)
    } else {
      groups.set(key, { first: record, members: [record] })
    }
  }

  return [...groups.entries()].map(([key, { first, members }]) => {
    const successful = members.filter((record) => record.state === 'succeeded')
    const numbers = (pick: (record: ResultRecord) => number | undefined) =>
      successful.map(pick).filter((value): value is number => value !== undefined)

    const latencyMedians = numbers((record) => record.metrics.latencyMedianMs)
    const latencyAverages = numbers((record) => record.metrics.latencyAvgMs)
    const { deviceId, modelId, threads, streams, precision, batch } = first.spec

    return {
      key,
      deviceId,
      modelId,
      threads,
      streams,
      precision,
      batch,
      repeats: members.length,
      succeeded: successful.length,
      throughputFps: summarize(numbers((record) => record.metrics.throughputFps)),
      latencyMedianMs: latencyMedians.length > 0 ? calculateMedian(latencyMedians) : undefined,
      latencyAvgMs: latencyAverages.length > 0 ? calculateMedian(latencyAverages) : undefined,
    }
  })
}

function combinationKey(record: ResultRecord): string {
  const { deviceId, modelId, threads, streams, precision, batch } = record.spec
  return `${deviceId}/${modelId}/t${threads}-s${streams}-${precision}-b${batch}`
}
