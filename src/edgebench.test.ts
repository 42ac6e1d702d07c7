import { describe, it, expect } from '@jest/globals'
import { run, defineConfig } from './edgebench'
import { ConfigValidationError } from './core/config'
import { InvalidMatrixError } from './core/errors'
import type { BenchConfigInput, InvocationSpec, ResultRecord, RunSummary } from './core/types'
import { StubDevice } from './devices'

const config = defineConfig({
  project: { name: 'api-project', runId: 'api-run' },
  devices: [
    { id: 'dev-a', kind: 'stub' },
    { id: 'dev-b', kind: 'stub' },
  ],
  models: [{ id: 'net', path: 'models/net.xml' }],
  bundle: { root: '/host/bundle' },
  run: { matrix: { threads: [2], streams: [1, 2] }, timeoutMs: 1000 },
  retry: { maxAttempts: 1 },
})

describe('run', () => {
  it('should execute the matrix and return records, manifest and summary', async () => {
    const { records, manifest, summary } = await run({ config, quiet: true })

    expect(records.map((record) => record.spec.id)).toEqual([
      'dev-a/net/t2-s1-FP16-b1#0',
      'dev-a/net/t2-s2-FP16-b1#0',
      'dev-b/net/t2-s1-FP16-b1#0',
      'dev-b/net/t2-s2-FP16-b1#0',
    ])
    expect(manifest.runId).toBe('api-run')
    expect(summary.passed).toBe(true)
    expect(summary.records).toBe(records)
  })

  it('should call the progress callbacks', async () => {
    const started: number[] = []
    const specs: InvocationSpec[] = []
    const completed: ResultRecord[] = []
    const summaries: RunSummary[] = []

    await run({
      config,
      quiet: true,
      onStart: (expected) => started.push(expected),
      onInvocationStart: (spec) => specs.push(spec),
      onInvocationComplete: (record) => completed.push(record),
      onComplete: (summary) => summaries.push(summary),
    })

    expect(started).toEqual([4])
    expect(specs).toHaveLength(4)
    expect(completed.map((record) => record.index).sort()).toEqual([0, 1, 2, 3])
    expect(summaries).toHaveLength(1)
  })

  it('should honour a device selection', async () => {
    const { records } = await run({ config, quiet: true, selection: { devices: ['dev-b'] } })

    expect(records.map((record) => record.spec.deviceId)).toEqual(['dev-b', 'dev-b'])
    expect(records.map((record) => record.index)).toEqual([0, 1])
  })

  it('should use the supplied device factory', async () => {
    const built: string[] = []

    await run({
      config,
      quiet: true,
      deviceFactory: (target) => {
        built.push(target.id)
        return new StubDevice(target.id, { info: { model: 'Factory Board' } })
      },
    })

    expect(built.sort()).toEqual(['dev-a', 'dev-b'])
  })

  it('should return an empty cancelled run when the signal is already aborted', async () => {
    const controller = new AbortController()
    controller.abort()

    const { records, manifest, summary } = await run({ config, quiet: true, signal: controller.signal })

    expect(records).toEqual([])
    expect(manifest.cancelled).toBe(true)
    expect(summary.passed).toBe(false)
  })

  it('should reject an invalid configuration', async () => {
    const broken: BenchConfigInput = { ...config, models: [] }

    await expect(run({ config: broken, quiet: true })).rejects.toBeInstanceOf(ConfigValidationError)
  })

  it('should reject an invalid matrix', async () => {
    await expect(run({ config, quiet: true, selection: { models: ['missing'] } })).rejects.toBeInstanceOf(
      InvalidMatrixError,
    )
  })
})
