import { describe, it, expect, beforeEach } from '@jest/globals'
import { Runner } from './runner'
import { CommandTimeoutError, InvalidMatrixError } from './errors'
import type { BenchConfig, BenchConfigInput, InvocationSpec, InvocationState, ResultRecord } from './types'
import { StubDevice, StubResponder, syntheticBenchmarkOutput } from '../devices'
import { createTestConfig } from '../testing/config'
import { silentLogger } from '../logger'

const ROOT = '/data/local/tmp/edgebench'

describe('Runner', () => {
  let stubs: Map<string, StubDevice>
  let built: string[]

  const createRunner = (config: BenchConfig, options: { selection?: { devices?: string[] } } = {}) =>
    new Runner(config, {
      logger: silentLogger,
      selection: options.selection,
      deviceFactory: (target) => {
        built.push(target.id)
        const stub = stubs.get(target.id) ?? new StubDevice(target.id)
        stubs.set(target.id, stub)
        return stub
      },
    })

  const matrixConfig = (run: NonNullable<BenchConfigInput['run']> = {}) =>
    createTestConfig({
      run: {
        matrix: { threads: [1, 2], streams: [1, 2], precision: ['FP16'], batch: [1] },
        repeats: 2,
        timeoutMs: 1000,
        ...run,
      },
    })

  beforeEach(() => {
    stubs = new Map()
    built = []
  })

  it('should record one result per point of the matrix in expansion order', async () => {
    const { records, manifest, summary } = await createRunner(matrixConfig()).run()

    expect(records).toHaveLength(16)
    expect(records.map((record) => record.index)).toEqual([...Array(16).keys()])
    expect(records[0]?.spec.id).toBe('dev-a/net/t1-s1-FP16-b1#0')
    expect(records[15]?.spec.id).toBe('dev-b/net/t2-s2-FP16-b1#1')
    expect(records.every((record) => record.state === 'succeeded')).toBe(true)
    expect(manifest).toMatchObject({
      runId: 'run-1',
      expectedInvocations: 16,
      recordedInvocations: 16,
      succeeded: 16,
      cancelled: false,
    })
    expect(summary.passed).toBe(true)
    expect(summary.aggregates).toHaveLength(8)
  })

  it('should attach the probed device to records and the manifest', async () => {
    const { records, manifest } = await createRunner(createTestConfig()).run()

    expect(records[0]?.device).toEqual({ id: 'dev-a', kind: 'stub', os: 'stub' })
    expect(manifest.devices.map((device) => device.id)).toEqual(['dev-a', 'dev-b'])
  })

  it('should leave no scratch directories behind', async () => {
    await createRunner(matrixConfig()).run()

    for (const stub of stubs.values()) {
      expect(stub.listFiles(`${ROOT}/runs`)).toEqual([`${ROOT}/runs`])
    }
  })

  it('should reject an invalid matrix before touching any device', async () => {
    const runner = createRunner(createTestConfig(), { selection: { devices: ['ghost'] } })

    await expect(runner.run()).rejects.toBeInstanceOf(InvalidMatrixError)
    expect(built).toEqual([])
  })

  it('should retry an unreachable device, then record it as failed and keep going', async () => {
    const offline = new StubDevice('dev-b')
    offline.setReachable(false)
    stubs.set('dev-b', offline)

    const { records, manifest, summary } = await createRunner(createTestConfig()).run()

    expect(records.map((record) => record.state)).toEqual(['succeeded', 'failed'])
    expect(records[1]?.failure?.kind).toBe('DeviceUnreachable')
    expect(records[1]?.outcome.attempts).toBe(3)
    expect(records[1]?.device).toBeUndefined()
    expect(records[1]?.metrics).toEqual({ parseStatus: 'failed' })
    expect(manifest.devices.map((device) => device.id)).toEqual(['dev-a'])
    expect(summary.passed).toBe(false)
  })

  it('should never interleave invocations on one device while devices run in parallel', async () => {
    const active = new Map<string, number>()
    let overlapOnDevice = false
    let maxParallel = 0

    const responder: StubResponder = async (argv, _options, device) => {
      if (!argv.includes('-m')) return { exitCode: 0, stdout: '', stderr: '' }

      const running = (active.get(device.id) ?? 0) + 1
      active.set(device.id, running)
      if (running > 1) overlapOnDevice = true
      maxParallel = Math.max(maxParallel, [...active.values()].reduce((sum, count) => sum + count, 0))

      await new Promise((resolve) => setTimeout(resolve, 5))
      active.set(device.id, (active.get(device.id) ?? 1) - 1)
      return { exitCode: 0, stdout: syntheticBenchmarkOutput(argv), stderr: '' }
    }
    stubs.set('dev-a', new StubDevice('dev-a', { responder }))
    stubs.set('dev-b', new StubDevice('dev-b', { responder }))

    const { records } = await createRunner(matrixConfig({ repeats: 1 })).run()

    expect(records).toHaveLength(8)
    expect(overlapOnDevice).toBe(false)
    expect(maxParallel).toBe(2)
  })

  it('should run lanes one at a time when concurrency is one', async () => {
    const order: string[] = []
    const runner = createRunner(matrixConfig({ repeats: 1, concurrency: 1 }))
    runner.on('invocationStart', (spec: InvocationSpec) => order.push(spec.deviceId))

    await runner.run()

    expect(order).toEqual(['dev-a', 'dev-a', 'dev-a', 'dev-a', 'dev-b', 'dev-b', 'dev-b', 'dev-b'])
  })

  it('should stop dispatching once cancelled and report a partial run', async () => {
    const controller = new AbortController()
    const runner = createRunner(matrixConfig({ repeats: 1, concurrency: 1 }))
    runner.on('invocationComplete', () => controller.abort())

    const { records, manifest, summary } = await runner.run(controller.signal)

    expect(records).toHaveLength(1)
    expect(manifest.cancelled).toBe(true)
    expect(manifest.expectedInvocations).toBe(8)
    expect(summary.passed).toBe(false)
  })

  it('should emit progress events', async () => {
    const events: string[] = []
    const states: InvocationState[] = []
    const runner = createRunner(createTestConfig({ devices: [{ id: 'dev-a', kind: 'stub' }] }))

    runner.on('runStart', (expected: number) => events.push(`runStart:${expected}`))
    runner.on('invocationStart', (spec: InvocationSpec) => events.push(`start:${spec.index}`))
    runner.on('invocationComplete', (record: ResultRecord) => events.push(`complete:${record.index}`))
    runner.on('runComplete', () => events.push('runComplete'))
    runner.on('stateChange', (_spec: InvocationSpec, state: InvocationState) => states.push(state))

    await runner.run()

    expect(events).toEqual(['runStart:1', 'start:0', 'complete:0', 'runComplete'])
    expect(states).toEqual(['pending', 'preparing', 'running', 'succeeded', 'recorded'])
  })

  it('should forward retries of timed out attempts', async () => {
    let calls = 0
    stubs.set(
      'dev-a',
      new StubDevice('dev-a', {
        responder: (argv) => {
          if (!argv.includes('-m')) return { exitCode: 0, stdout: '', stderr: '' }
          if (++calls === 1) throw new CommandTimeoutError(argv.join(' '), 1000)
          return { exitCode: 0, stdout: syntheticBenchmarkOutput(argv), stderr: '' }
        },
      }),
    )
    const retries: number[] = []
    const runner = createRunner(createTestConfig({ devices: [{ id: 'dev-a', kind: 'stub' }] }))
    runner.on('invocationRetry', (_spec: InvocationSpec, attempt: number) => retries.push(attempt))

    const { records } = await runner.run()

    expect(retries).toEqual([2])
    expect(records[0]?.state).toBe('succeeded')
    expect(records[0]?.outcome.attempts).toBe(2)
  })

  it('should warm up each model once per device before measuring', async () => {
    await createRunner(matrixConfig({ repeats: 1, warmup: true })).run()

    for (const stub of stubs.values()) {
      const benchmarks = stub.operations.filter((op) => op.op === 'shell' && op.argv.includes('-m'))
      const warmups = benchmarks.filter((op) => op.op === 'shell' && op.argv[op.argv.indexOf('-niter') + 1] === '10')

      expect(benchmarks).toHaveLength(5)
      expect(warmups).toHaveLength(1)
      expect(benchmarks[0]).toBe(warmups[0])
    }
  })

  it('should use stub devices for a dry run', async () => {
    const config = createTestConfig({ devices: [{ id: 'phone', kind: 'bridge', serial: 'test-serial' }] })
    const runner = new Runner(config, { logger: silentLogger, dryRun: true })

    const { records } = await runner.run()

    expect(records).toHaveLength(1)
    expect(records[0]?.state).toBe('succeeded')
    expect(records[0]?.device?.kind).toBe('stub')
  })
})
