/**
 * Basic usage:
 * ```ts
 * import { run } from 'edgebench'
 *
 * const { summary } = await run({
 *   config: {
 *     project: { name: 'vision', runId: 'nightly-42' },
 *     devices: [{ id: 'pixel-7', kind: 'bridge' }],
 *     models: [{ id: 'mobilenet', path: 'models/mobilenet.xml', files: ['models/mobilenet.bin'] }],
 *     bundle: { root: './bundle' },
 *     run: { matrix: { threads: [1, 4], streams: [1, 2] } },
 *   },
 *   onInvocationComplete: (record) => console.log(record.spec.id, record.metrics.throughputFps),
 * })
 * ```
 */

import type {
  BenchConfig,
  BenchConfigInput,
  InvocationSpec,
  ResultRecord,
  RunSummary,
} from './core/types'
import type { MatrixSelection } from './core/matrix'
import type { DeviceFactory, DevicePool } from './devices'
import type { Logger } from './logger'

export interface RunOptions {
  /** Raw or already validated configuration; validated again either way */
  config: BenchConfigInput | BenchConfig

  /** Restrict the run to some of the configured devices or models */
  selection?: MatrixSelection

  /** Replace every device with an in-memory stub */
  dryRun?: boolean

  /** Cancels the run: nothing new is dispatched, in-flight invocations finish */
  signal?: AbortSignal

  /** Progress callbacks */
  onStart?: (expectedInvocations: number) => void
  onInvocationStart?: (spec: InvocationSpec) => void
  onInvocationComplete?: (record: ResultRecord) => void
  onComplete?: (summary: RunSummary) => void

  /** Suppress all log output */
  quiet?: boolean
  logger?: Logger

  /** Advanced: supply devices instead of building them from config */
  pool?: DevicePool
  deviceFactory?: DeviceFactory
}
