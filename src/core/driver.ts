import { EventEmitter } from 'events'
import { basename, posix } from 'path'
import {
  CommandTimeoutError,
  DeviceNotFoundError,
  DeviceUnreachableError,
  InvalidMatrixError,
  ParseFailureError,
  ProcessError,
  errorMessage,
  isBenchError,
} from './errors'
import type {
  AttemptRecord,
  BenchConfig,
  ExecutionOutcome,
  FailureInfo,
  InvocationResult,
  InvocationSpec,
  InvocationState,
  MetricsRecord,
  ModelConfig,
  TerminalState,
} from './types'
import { emptyMetrics } from './types'
import {
  benchmarkEnv,
  buildBenchmarkCommand,
  bundleEntries,
  localModelPath,
  remoteLayout,
  remoteModelDir,
  remoteModelPath,
  scratchDir,
} from './command-builder'
import { backoffDelay } from './utils/backoff'
import { sleep } from './utils/sleep'
import { detectToolError, parseBenchmarkOutput } from '../parsers'
import type { DeviceHandle, DevicePool } from '../devices'
import type { Logger } from '../logger'
import { logger as defaultLogger } from '../logger'

export const WARMUP_ITERATIONS = 10

export interface DriverEvents {
  stateChange: (spec: InvocationSpec, state: InvocationState) => void
  invocationRetry: (spec: InvocationSpec, nextAttempt: number, delayMs: number, previous: AttemptRecord) => void
  deviceDeployed: (deviceId: string) => void
}

export interface ExecutionDriverOptions {
  pool: DevicePool
  logger?: Logger
}

type AttemptResult = Pick<ExecutionOutcome, 'status' | 'exitCode' | 'stdout' | 'stderr' | 'error'>

interface AttemptOutput {
  result: AttemptResult
  command?: string[]
  temperatureC?: number
}

// Timeouts and lost connections may clear up; everything else is final
function isRetryable(result: AttemptResult): boolean {
  return result.status === 'timeout' || result.error?.kind === 'DeviceUnreachable'
}

/**
 * Runs invocations against devices: deploys the bundle once per device,
 * stages models, runs the benchmark with timeout and retry, and always
 * removes the invocation's scratch directory afterwards.
 */
export class ExecutionDriver extends EventEmitter {
  private readonly pool: DevicePool
  private readonly logger: Logger
  private readonly models: Map<string, ModelConfig>
  private readonly deployed = new Set<string>()

  constructor(
    private readonly config: BenchConfig,
    options: ExecutionDriverOptions,
  ) {
    super()
    this.pool = options.pool
    this.logger = options.logger ?? defaultLogger
    this.models = new Map(config.models.map((model) => [model.id, model]))
  }

  /**
   * Never rejects: every failure becomes a classified InvocationResult.
   * Each attempt covers the probe, deploy, staging and the benchmark run.
   */
  async execute(spec: InvocationSpec, signal?: AbortSignal): Promise<InvocationResult> {
    const startedAt = new Date()
    const { maxAttempts } = this.config.retry
    const attemptLog: AttemptRecord[] = []
    this.setState(spec, 'pending')

    for (let attempt = 1; ; attempt++) {
      const attemptStartedAt = new Date()
      const { result, command, temperatureC } = await this.attempt(spec, signal)
      const durationMs = Date.now() - attemptStartedAt.getTime()

      const outcome: ExecutionOutcome = {
        ...result,
        durationMs,
        attempts: attempt,
        attemptLog: [...attemptLog],
        command,
      }

      if (!isRetryable(result) || attempt >= maxAttempts || signal?.aborted) {
        return this.complete(spec, outcome, startedAt, temperatureC)
      }

      const record: AttemptRecord = {
        attempt,
        status: result.status,
        exitCode: result.exitCode,
        durationMs,
        startedAt: attemptStartedAt,
        message: result.error?.message,
      }
      attemptLog.push(record)

      const delayMs = backoffDelay(attempt, this.config.retry)
      this.logger.warn(
        `[${spec.id}] attempt ${attempt}/${maxAttempts} ended with ${result.status}, retrying in ${delayMs}ms`,
      )
      this.emit('invocationRetry', spec, attempt + 1, delayMs, record)

      if (!(await sleep(delayMs, signal))) {
        return this.complete(spec, outcome, startedAt, temperatureC)
      }
    }
  }

  /**
   * Unrecorded short run that brings caches and clocks up before measuring.
   * Failures are logged and do not affect the run.
   */
  async warmup(spec: InvocationSpec, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) return

    try {
      await this.pool.withDevice(spec.deviceId, async (device) => {
        await this.ensureDeployed(device)

        const scratch = scratchDir(this.config, `warmup-${spec.modelId}`)
        try {
          await device.mkdir(scratch)
          const modelPath = await this.stageModel(device, this.model(spec.modelId), scratch)
          const command = buildBenchmarkCommand(this.config, spec, modelPath, { iterations: WARMUP_ITERATIONS })

          this.logger.debug(`[${spec.deviceId}] warming up ${spec.modelId}`)
          const result = await device.shell(command, this.benchmarkShellOptions())
          if (result.exitCode !== 0) {
            this.logger.warn(`[${spec.deviceId}] warmup of ${spec.modelId} exited with code ${result.exitCode}`)
          }
        } finally {
          await this.cleanup(device, scratch)
        }
      })
    } catch (error) {
      this.logger.warn(`[${spec.deviceId}] warmup of ${spec.modelId} failed: ${errorMessage(error)}`)
    }
  }

  isDeployed(deviceId: string): boolean {
    return this.deployed.has(deviceId)
  }

  private async ensureDeployed(device: DeviceHandle): Promise<void> {
    if (this.deployed.has(device.id)) return

    const layout = remoteLayout(this.config)
    const timeoutMs = this.config.run.timeoutMs

    await device.mkdir(layout.root)
    const writable = await device.shell(['test', '-w', layout.root], { timeoutMs })
    if (writable.exitCode !== 0) {
      throw new ProcessError(`Deploy root ${layout.root} is not writable on ${device.id}`, writable.exitCode)
    }

    if (await device.exists(layout.binary)) {
      this.logger.debug(`[${device.id}] benchmark binary already resident, skipping bundle push`)
    } else {
      for (const entry of bundleEntries(this.config)) {
        this.logger.info(`[${device.id}] pushing ${entry}`)
        await device.push(entry, `${layout.root}/`)
      }
    }

    const chmod = await device.shell(['chmod', '+x', layout.binary], { timeoutMs })
    if (chmod.exitCode !== 0) {
      throw new ProcessError(`chmod of ${layout.binary} failed on ${device.id}`, chmod.exitCode, chmod.stderr)
    }

    await device.mkdir(layout.modelsDir)
    await device.mkdir(layout.runsDir)

    if (this.config.run.tuneDevice) {
      await this.tune(device)
    }

    this.deployed.add(device.id)
    this.emit('deviceDeployed', device.id)
  }

  // Best effort: a failing tuning command is logged and skipped
  private async tune(device: DeviceHandle): Promise<void> {
    for (const command of device.tuningCommands?.() ?? []) {
      try {
        const result = await device.shell(command, { timeoutMs: this.config.run.timeoutMs })
        if (result.exitCode !== 0) {
          this.logger.warn(`[${device.id}] tuning command "${command.join(' ')}" exited with ${result.exitCode}`)
        }
      } catch (error) {
        if (error instanceof DeviceNotFoundError || error instanceof DeviceUnreachableError) {
          throw error
        }
        this.logger.warn(`[${device.id}] tuning command "${command.join(' ')}" failed: ${errorMessage(error)}`)
      }
    }
  }

  private async stageModel(device: DeviceHandle, model: ModelConfig, scratch: string): Promise<string> {
    const dir = remoteModelDir(this.config, model, scratch)

    for (const file of [model.path, ...model.files]) {
      const remote = posix.join(dir, basename(file))
      if (model.persist && (await device.exists(remote))) {
        continue
      }
      await device.push(localModelPath(this.config, file), remote)
    }

    return remoteModelPath(this.config, model, scratch)
  }

  private async waitForThermal(device: DeviceHandle, signal?: AbortSignal): Promise<number | undefined> {
    let reading = await this.readTemperature(device)
    const thermal = this.config.run.thermal
    if (!thermal) return reading

    const deadline = Date.now() + thermal.maxWaitMs
    while (reading !== undefined && reading > thermal.maxTemperatureC) {
      if (Date.now() >= deadline) {
        this.logger.warn(
          `[${device.id}] still at ${reading}°C after ${thermal.maxWaitMs}ms, continuing above ${thermal.maxTemperatureC}°C`,
        )
        break
      }

      this.logger.info(`[${device.id}] ${reading}°C is above ${thermal.maxTemperatureC}°C, waiting to cool down`)
      if (!(await sleep(thermal.pollMs, signal))) break
      reading = await this.readTemperature(device)
    }

    return reading
  }

  private async readTemperature(device: DeviceHandle): Promise<number | undefined> {
    if (!device.temperature) return undefined

    try {
      return await device.temperature()
    } catch (error) {
      if (error instanceof DeviceNotFoundError || error instanceof DeviceUnreachableError) {
        throw error
      }
      this.logger.debug(`[${device.id}] temperature unavailable: ${errorMessage(error)}`)
      return undefined
    }
  }

  private async attempt(spec: InvocationSpec, signal?: AbortSignal): Promise<AttemptOutput> {
    const context: Omit<AttemptOutput, 'result'> = {}

    try {
      const result = await this.pool.withDevice(spec.deviceId, async (device) => {
        this.setState(spec, 'preparing')
        await this.ensureDeployed(device)

        const scratch = scratchDir(this.config, spec.index)
        try {
          await device.mkdir(scratch)
          const modelPath = await this.stageModel(device, this.model(spec.modelId), scratch)
          context.temperatureC = await this.waitForThermal(device, signal)
          context.command = buildBenchmarkCommand(this.config, spec, modelPath)

          this.setState(spec, 'running')
          return await this.runBenchmark(device, context.command)
        } finally {
          await this.cleanup(device, scratch)
        }
      })
      return { ...context, result }
    } catch (error) {
      return { ...context, result: this.classify(spec, error) }
    }
  }

  private async runBenchmark(device: DeviceHandle, command: string[]): Promise<AttemptResult> {
    const result = await device.shell(command, this.benchmarkShellOptions())
    const toolError = detectToolError(result.stdout, result.stderr)

    if (result.exitCode !== 0 || toolError) {
      const error = new ProcessError(
        toolError ?? `benchmark exited with code ${result.exitCode}`,
        result.exitCode,
        result.stderr,
      )
      return {
        status: 'process-error',
        exitCode: result.exitCode,
        stdout: result.stdout,
        stderr: result.stderr,
        error: { kind: error.kind, message: error.message },
      }
    }

    return { status: 'success', exitCode: 0, stdout: result.stdout, stderr: result.stderr }
  }

  private classify(spec: InvocationSpec, error: unknown): AttemptResult {
    this.logger.debug(`[${spec.id}] attempt failed: ${errorMessage(error)}`)

    if (error instanceof CommandTimeoutError) {
      return {
        status: 'timeout',
        stdout: error.stdout,
        stderr: error.stderr,
        error: { kind: error.kind, message: error.message },
      }
    }

    if (error instanceof DeviceUnreachableError || error instanceof DeviceNotFoundError) {
      // the next attempt probes again
      if (error instanceof DeviceUnreachableError && this.pool.health(spec.deviceId) === 'reachable') {
        this.pool.markUnreachable(spec.deviceId)
      }
      return { status: 'device-unreachable', stdout: '', stderr: '', error: { kind: error.kind, message: error.message } }
    }

    return {
      status: 'process-error',
      exitCode: error instanceof ProcessError ? error.exitCode : undefined,
      stdout: '',
      stderr: error instanceof ProcessError ? error.stderr : '',
      error: { kind: isBenchError(error) ? error.kind : 'ProcessError', message: errorMessage(error) },
    }
  }

  private complete(
    spec: InvocationSpec,
    outcome: ExecutionOutcome,
    startedAt: Date,
    temperatureC?: number,
  ): InvocationResult {
    let metrics: MetricsRecord = emptyMetrics()
    let state: TerminalState
    let failure: FailureInfo | undefined = outcome.error

    switch (outcome.status) {
      case 'success': {
        metrics = parseBenchmarkOutput(outcome.stdout, outcome.stderr)
        if (metrics.parseStatus === 'failed') {
          const error = new ParseFailureError(`No throughput found in the output of ${spec.id}`)
          state = 'failed'
          failure = { kind: error.kind, message: error.message }
        } else {
          state = 'succeeded'
        }
        break
      }
      case 'timeout':
        state = 'timed-out'
        break
      default:
        state = 'failed'
    }

    this.setState(spec, state)

    return {
      spec,
      state,
      outcome,
      metrics,
      failure,
      temperatureC,
      startedAt,
      finishedAt: new Date(),
    }
  }

  private async cleanup(device: DeviceHandle, scratch: string): Promise<void> {
    try {
      await device.remove(scratch)
    } catch (error) {
      this.logger.warn(`[${device.id}] could not remove ${scratch}: ${errorMessage(error)}`)
    }
  }

  private benchmarkShellOptions() {
    return {
      timeoutMs: this.config.run.timeoutMs,
      cwd: remoteLayout(this.config).root,
      env: benchmarkEnv(this.config),
    }
  }

  private model(id: string): ModelConfig {
    const model = this.models.get(id)
    if (!model) {
      throw new InvalidMatrixError(`Unknown model "${id}"`)
    }
    return model
  }

  private setState(spec: InvocationSpec, state: InvocationState): void {
    this.emit('stateChange', spec, state)
  }
}
