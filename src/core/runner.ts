import { EventEmitter } from 'events'
import type {
  AttemptRecord,
  BenchConfig,
  InvocationSpec,
  InvocationState,
  ResultRecord,
  RunManifest,
  RunSummary,
} from './types'
import { ExecutionDriver } from './driver'
import { countInvocations, expandDimensions, MatrixDimensions, MatrixSelection, validateMatrix } from './matrix'
import { createScheduler, Lane } from './scheduler'
import { DeviceFactory, DevicePool, createDeviceFactory } from '../devices'
import { ResultAggregator } from '../reporting/result-aggregator'
import type { Logger } from '../logger'
import { logger as defaultLogger } from '../logger'

export interface RunnerEvents {
  runStart: (expectedInvocations: number, dimensions: MatrixDimensions) => void
  invocationStart: (spec: InvocationSpec) => void
  invocationComplete: (record: ResultRecord) => void
  invocationRetry: (spec: InvocationSpec, nextAttempt: number, delayMs: number, previous: AttemptRecord) => void
  stateChange: (spec: InvocationSpec, state: InvocationState) => void
  runComplete: (summary: RunSummary) => void
}

export interface RunnerOptions {
  /** Shared pool; built from config.devices when omitted */
  pool?: DevicePool
  deviceFactory?: DeviceFactory
  logger?: Logger
  selection?: MatrixSelection
  /** Replace every device with an in-memory stub */
  dryRun?: boolean
}

export interface RunResult {
  records: ResultRecord[]
  manifest: RunManifest
  summary: RunSummary
}

/**
 * Main runner: expands the matrix, runs one lane per device through the
 * scheduler and collects every outcome into the aggregator
 */
export class Runner extends EventEmitter {
  private readonly config: BenchConfig
  private readonly pool: DevicePool
  private readonly driver: ExecutionDriver
  private readonly logger: Logger
  private readonly selection: MatrixSelection

  constructor(config: BenchConfig, options: RunnerOptions = {}) {
    super()
    this.config = config
    this.logger = options.logger ?? defaultLogger
    this.selection = options.selection ?? {}

    this.pool =
      options.pool ??
      new DevicePool(config.devices, {
        factory: options.deviceFactory ?? createDeviceFactory({ logger: this.logger, dryRun: options.dryRun }),
        logger: this.logger,
      })

    this.driver = new ExecutionDriver(config, { pool: this.pool, logger: this.logger })
    this.setupEventForwarding()
  }

  /**
   * Throws InvalidMatrixError before touching any device. Device and
   * process failures end up as records, never as rejections.
   */
  async run(signal?: AbortSignal): Promise<RunResult> {
    const dimensions = validateMatrix(this.config, this.selection)
    const expected = countInvocations(dimensions)
    const aggregator = new ResultAggregator({ project: this.config.project, expectedInvocations: expected })

    const scheduler = createScheduler<InvocationSpec, ResultRecord>({
      concurrency: this.config.run.concurrency ?? dimensions.devices.length,
      cooldownMs: this.config.run.cooldownMs,
      signal,
      logger: this.logger,
    })

    for (const spec of expandDimensions(dimensions, signal)) {
      scheduler.addLane(spec.deviceId, [spec])
    }

    if (this.config.run.warmup) {
      scheduler.setLaneSetup((lane) => this.warmupLane(lane, signal))
    }

    scheduler.setTaskHandler(async (spec) => {
      this.emit('invocationStart', spec)
      const result = await this.driver.execute(spec, signal)
      const record = aggregator.add(result, this.pool.info(spec.deviceId))
      this.emit('stateChange', spec, 'recorded')
      this.emit('invocationComplete', record)
      return record
    })

    this.logger.info(
      `Starting benchmark run ${this.config.project.runId} with ${expected} invocation(s) ` +
        `across ${dimensions.devices.length} device(s)`,
    )
    this.emit('runStart', expected, dimensions)

    const { cancelled } = await scheduler.run()

    for (const id of dimensions.devices) {
      const info = this.pool.info(id)
      if (info) aggregator.recordDevice(info)
    }

    const interrupted = cancelled && aggregator.size < expected
    if (interrupted) {
      this.logger.warn(`Run cancelled after ${aggregator.size} of ${expected} invocation(s)`)
    }

    aggregator.completeRun(interrupted)
    const summary = aggregator.getSummary()

    this.logger.info(
      `Benchmark run completed: ${summary.manifest.succeeded} succeeded, ` +
        `${summary.manifest.failed} failed, ${summary.manifest.timedOut} timed out`,
    )
    this.emit('runComplete', summary)

    return { records: summary.records, manifest: summary.manifest, summary }
  }

  getPool(): DevicePool {
    return this.pool
  }

  // One unrecorded warmup per model, in the order the lane first needs them
  private async warmupLane(lane: Lane<InvocationSpec>, signal?: AbortSignal): Promise<void> {
    const seen = new Set<string>()
    for (const spec of lane.items) {
      if (seen.has(spec.modelId)) continue
      seen.add(spec.modelId)
      await this.driver.warmup(spec, signal)
    }
  }

  private setupEventForwarding(): void {
    this.driver.on('stateChange', (spec: InvocationSpec, state: InvocationState) => {
      this.emit('stateChange', spec, state)
    })

    this.driver.on(
      'invocationRetry',
      (spec: InvocationSpec, nextAttempt: number, delayMs: number, previous: AttemptRecord) => {
        this.emit('invocationRetry', spec, nextAttempt, delayMs, previous)
      },
    )
  }
}

export function createRunner(config: BenchConfig, options?: RunnerOptions): Runner {
  return new Runner(config, options)
}
