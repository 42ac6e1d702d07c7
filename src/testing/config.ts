import { BenchConfig, BenchConfigInput, BenchConfigSchema } from '../core/types'

/**
 * Validated config for tests: two stub devices, one model, a single-point
 * matrix and no backoff. Overrides replace top-level sections.
 */
export function createTestConfig(overrides: Partial<BenchConfigInput> = {}): BenchConfig {
  return BenchConfigSchema.parse({
    project: { name: 'test-project', runId: 'run-1' },
    devices: [
      { id: 'dev-a', kind: 'stub' },
      { id: 'dev-b', kind: 'stub' },
    ],
    models: [{ id: 'net', path: 'models/net.xml', files: ['models/net.bin'] }],
    bundle: { root: '/host/bundle' },
    deployRoot: '/data/local/tmp/edgebench',
    run: {
      matrix: { threads: [4], streams: [1], precision: ['FP16'], batch: [1] },
      timeoutMs: 1000,
    },
    retry: { maxAttempts: 3, backoffMs: 0, factor: 2, maxBackoffMs: 0 },
    ...overrides,
  })
}
