import { InvalidMatrixError } from './errors'
import type { BenchConfig, InvocationSpec } from './types'

export interface MatrixSelection {
  /** Restrict the run to these device ids */
  devices?: string[]
  /** Restrict the run to these model ids */
  models?: string[]
}

export interface MatrixDimensions {
  devices: readonly string[]
  models: readonly string[]
  threads: readonly number[]
  streams: readonly number[]
  precision: readonly string[]
  batch: readonly number[]
  repeats: number
}

export interface ExpandOptions {
  selection?: MatrixSelection
  signal?: AbortSignal
}

export function invocationId(spec: Omit<InvocationSpec, 'index' | 'id' | 'repeats'>): string {
  return `${spec.deviceId}/${spec.modelId}/t${spec.threads}-s${spec.streams}-${spec.precision}-b${spec.batch}#${spec.repeatIndex}`
}

/**
 * Resolves the dimensions of the run and checks them all at once.
 * Throws InvalidMatrixError listing every problem found.
 */
export function validateMatrix(config: BenchConfig, selection: MatrixSelection = {}): MatrixDimensions {
  const { matrix, repeats } = config.run
  const problems: string[] = []

  const deviceIds = config.devices.map((device) => device.id)
  const modelIds = config.models.map((model) => model.id)

  const devices = narrow('device', deviceIds, [matrix.devices, selection.devices], problems)
  const models = narrow('model', modelIds, [matrix.models, selection.models], problems)

  const dimensions: MatrixDimensions = {
    devices,
    models,
    threads: matrix.threads,
    streams: matrix.streams,
    precision: matrix.precision,
    batch: matrix.batch,
    repeats,
  }

  const lists: Array<[string, readonly unknown[]]> = [
    ['devices', dimensions.devices],
    ['models', dimensions.models],
    ['threads', dimensions.threads],
    ['streams', dimensions.streams],
    ['precision', dimensions.precision],
    ['batch', dimensions.batch],
  ]

  for (const [name, values] of lists) {
    if (values.length === 0) {
      problems.push(`matrix.${name} is empty`)
    } else if (new Set(values).size !== values.length) {
      problems.push(`matrix.${name} contains duplicate values`)
    }
  }

  if (!Number.isInteger(repeats) || repeats < 1) {
    problems.push(`run.repeats must be a positive integer, got ${repeats}`)
  }

  if (problems.length > 0) {
    throw new InvalidMatrixError(`Invalid run matrix: ${problems.join('; ')}`, problems)
  }

  return dimensions
}

/**
 * Number of invocations the matrix expands to, without materializing them
 */
export function countInvocations(dimensions: MatrixDimensions): number {
  return (
    dimensions.devices.length *
    dimensions.models.length *
    dimensions.threads.length *
    dimensions.streams.length *
    dimensions.precision.length *
    dimensions.batch.length *
    dimensions.repeats
  )
}

/**
 * Yields invocations in a fixed order: devices, models, threads, streams,
 * precision, batch, then repeat innermost. Each call starts a fresh expansion.
 */
export function* expandDimensions(dimensions: MatrixDimensions, signal?: AbortSignal): Generator<InvocationSpec> {
  let index = 0

  for (const deviceId of dimensions.devices) {
    for (const modelId of dimensions.models) {
      for (const threads of dimensions.threads) {
        for (const streams of dimensions.streams) {
          for (const precision of dimensions.precision) {
            for (const batch of dimensions.batch) {
              for (let repeatIndex = 0; repeatIndex < dimensions.repeats; repeatIndex++) {
                if (signal?.aborted) return

                const point = { deviceId, modelId, threads, streams, precision, batch, repeatIndex }
                yield Object.freeze({
                  index: index++,
                  id: invocationId(point),
                  ...point,
                  repeats: dimensions.repeats,
                })
              }
            }
          }
        }
      }
    }
  }
}

export function* expandMatrix(config: BenchConfig, options: ExpandOptions = {}): Generator<InvocationSpec> {
  yield* expandDimensions(validateMatrix(config, options.selection), options.signal)
}

function narrow(
  label: string,
  configured: readonly string[],
  filters: Array<readonly string[] | undefined>,
  problems: string[],
): string[] {
  let ids = [...configured]

  for (const filter of filters) {
    if (!filter) continue

    const missing = filter.filter((id) => !configured.includes(id))
    for (const id of missing) {
      problems.push(`unknown ${label} "${id}"`)
    }
    // keep configuration order regardless of filter order
    ids = ids.filter((id) => filter.includes(id))
  }

  return ids
}
