/**
 * One concrete benchmark invocation produced by the matrix expander.
 * `index` is the position in the expansion and is the canonical sort key.
 */
export interface InvocationSpec {
  readonly index: number
  readonly id: string
  readonly deviceId: string
  readonly modelId: string
  readonly threads: number
  readonly streams: number
  readonly precision: string
  readonly batch: number
  readonly repeatIndex: number
  readonly repeats: number
}

export type InvocationState = 'pending' | 'preparing' | 'running' | 'succeeded' | 'failed' | 'timed-out' | 'recorded'

export type TerminalState = Extract<InvocationState, 'succeeded' | 'failed' | 'timed-out'>
