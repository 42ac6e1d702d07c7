import { mkdir, writeFile } from 'fs/promises'
import { dirname } from 'path'
import type { DeviceInfo } from '../../core/types/device'
import type { AttemptRecord } from '../../core/types/execution'
import type { MetricsRecord } from '../../core/types/metrics'
import type { FailureInfo, RepeatSummary, ResultRecord, RunSummary } from '../../core/types/reporting'

export interface JSONReporterOptions {
  /** Keep the benchmark tool's stdout/stderr on every result */
  includeRaw?: boolean
  includeAggregates?: boolean
  prettyPrint?: boolean
}

type IsoAttemptRecord = Omit<AttemptRecord, 'startedAt'> & { startedAt: string }

/**
 * JSON schema for machine-readable benchmark reports
 */
export interface JSONReport {
  manifest: {
    runId: string
    project: string
    description?: string
    startedAt: string // ISO string
    finishedAt: string // ISO string
    durationMs: number
    passed: boolean
    cancelled: boolean
    expectedInvocations: number
    recordedInvocations: number
    succeeded: number
    failed: number
    timedOut: number
    devices: DeviceInfo[]
  }

  results: Array<{
    index: number
    id: string
    deviceId: string
    modelId: string
    threads: number
    streams: number
    precision: string
    batch: number
    repeatIndex: number
    state: ResultRecord['state']
    status: ResultRecord['outcome']['status']
    exitCode?: number
    attempts: number
    durationMs: number
    metrics: MetricsRecord
    failure?: FailureInfo
    temperatureC?: number
    startedAt: string
    finishedAt: string
    command?: string[]
    attemptLog: IsoAttemptRecord[]
    device?: DeviceInfo
    stdout?: string
    stderr?: string
  }>

  aggregates: RepeatSummary[]

  meta: {
    version: string
    generatedAt: string // ISO string
    generator: string
  }
}

/**
 * JSON Reporter that outputs machine-readable benchmark results
 */
export class JSONReporter {
  private options: Required<JSONReporterOptions>

  constructor(options: JSONReporterOptions = {}) {
    this.options = {
      includeRaw: options.includeRaw ?? false,
      includeAggregates: options.includeAggregates ?? true,
      prettyPrint: options.prettyPrint ?? false,
    }
  }

  generate(summary: RunSummary): string {
    const report = this.createReport(summary)

    if (this.options.prettyPrint) {
      return JSON.stringify(report, null, 2)
    }

    return JSON.stringify(report)
  }

  async writeFile(summary: RunSummary, filePath: string): Promise<void> {
    await mkdir(dirname(filePath), { recursive: true })
    await writeFile(filePath, this.generate(summary), 'utf-8')
  }

  createReport(summary: RunSummary): JSONReport {
    const { manifest } = summary

    return {
      manifest: {
        runId: manifest.runId,
        project: manifest.project.name,
        description: manifest.project.description,
        startedAt: manifest.startedAt.toISOString(),
        finishedAt: manifest.finishedAt.toISOString(),
        durationMs: manifest.durationMs,
        passed: summary.passed,
        cancelled: manifest.cancelled,
        expectedInvocations: manifest.expectedInvocations,
        recordedInvocations: manifest.recordedInvocations,
        succeeded: manifest.succeeded,
        failed: manifest.failed,
        timedOut: manifest.timedOut,
        devices: manifest.devices,
      },

      results: summary.records.map((record) => this.formatRecord(record)),

      aggregates: this.options.includeAggregates ? summary.aggregates : [],

      meta: {
        version: '1.0.0',
        generatedAt: new Date().toISOString(),
        generator: 'edgebench-json-reporter',
      },
    }
  }

  private formatRecord(record: ResultRecord): JSONReport['results'][number] {
    const { spec, outcome } = record

    const result: JSONReport['results'][number] = {
      index: record.index,
      id: spec.id,
      deviceId: spec.deviceId,
      modelId: spec.modelId,
      threads: spec.threads,
      streams: spec.streams,
      precision: spec.precision,
      batch: spec.batch,
      repeatIndex: spec.repeatIndex,
      state: record.state,
      status: outcome.status,
      exitCode: outcome.exitCode,
      attempts: outcome.attempts,
      durationMs: outcome.durationMs,
      metrics: record.metrics,
      failure: record.failure,
      temperatureC: record.temperatureC,
      startedAt: record.startedAt.toISOString(),
      finishedAt: record.finishedAt.toISOString(),
      command: outcome.command,
      attemptLog: outcome.attemptLog.map((attempt) => ({ ...attempt, startedAt: attempt.startedAt.toISOString() })),
      device: record.device,
    }

    if (this.options.includeRaw) {
      result.stdout = outcome.stdout
      result.stderr = outcome.stderr
    }

    return result
  }
}
