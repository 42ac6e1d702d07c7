import { validateConfig } from './core/config'
import { createRunner, Runner, RunResult } from './core/runner'
import type { BenchConfigInput } from './core/types'
import type { RunOptions } from './api'
import { silentLogger } from './logger'

/**
 * Examples:
 * ```ts
 * // Whole matrix
 * const { records } = await run({ config })
 *
 * // One device, cancellable, with progress
 * const controller = new AbortController()
 * const { manifest } = await run({
 *   config,
 *   selection: { devices: ['pixel-7'] },
 *   signal: controller.signal,
 *   onInvocationComplete: (record) => console.log(record.spec.id, record.state),
 * })
 * ```
 */
export async function run(options: RunOptions): Promise<RunResult> {
  const config = validateConfig(options.config)

  const runner = createRunner(config, {
    logger: options.quiet ? silentLogger : options.logger,
    selection: options.selection,
    dryRun: options.dryRun,
    pool: options.pool,
    deviceFactory: options.deviceFactory,
  })

  setupCallbacks(runner, options)

  return runner.run(options.signal)
}

/**
 * Typed helper for bench.config.js files
 */
export function defineConfig(config: BenchConfigInput): BenchConfigInput {
  return config
}

function setupCallbacks(runner: Runner, options: RunOptions): void {
  if (options.onStart) {
    runner.on('runStart', options.onStart)
  }

  if (options.onInvocationStart) {
    runner.on('invocationStart', options.onInvocationStart)
  }

  if (options.onInvocationComplete) {
    runner.on('invocationComplete', options.onInvocationComplete)
  }

  if (options.onComplete) {
    runner.on('runComplete', options.onComplete)
  }
}
