import { basename, isAbsolute, join, posix } from 'path'
import type { BenchConfig, InvocationSpec, ModelConfig } from './types'

export interface RemoteLayout {
  root: string
  binary: string
  libDir: string
  modelsDir: string
  runsDir: string
}

export function remoteLayout(config: BenchConfig): RemoteLayout {
  const root = config.deployRoot.replace(/\/+$/, '') || '/'
  return {
    root,
    binary: posix.join(root, config.bundle.binary),
    libDir: posix.join(root, config.bundle.libDir),
    modelsDir: posix.join(root, 'models'),
    runsDir: posix.join(root, 'runs'),
  }
}

export function scratchDir(config: BenchConfig, index: number | string): string {
  return posix.join(remoteLayout(config).runsDir, String(index))
}

/**
 * Host paths of the bundle entries that go to the device, pushed into the
 * deploy root as whole trees (bin/, lib/)
 */
export function bundleEntries(config: BenchConfig): string[] {
  const entries = [config.bundle.binary, config.bundle.libDir].map((path) => path.split('/').filter(Boolean)[0] ?? path)
  return [...new Set(entries)].map((entry) => join(config.bundle.root, entry))
}

/** Host path of a model file; relative paths live under the bundle root */
export function localModelPath(config: BenchConfig, path: string): string {
  return isAbsolute(path) ? path : join(config.bundle.root, path)
}

/**
 * Remote location of a model: resident under models/ when persisted,
 * otherwise inside the invocation's scratch directory
 */
export function remoteModelDir(config: BenchConfig, model: ModelConfig, scratch: string): string {
  return model.persist ? remoteLayout(config).modelsDir : scratch
}

export function remoteModelPath(config: BenchConfig, model: ModelConfig, scratch: string): string {
  return posix.join(remoteModelDir(config, model, scratch), basename(model.path))
}

export interface CommandOverrides {
  iterations?: number
}

/**
 * Argument vector for one benchmark run. Values are rendered with String().
 */
export function buildBenchmarkCommand(
  config: BenchConfig,
  spec: InvocationSpec,
  modelPath: string,
  overrides: CommandOverrides = {},
): string[] {
  const { run } = config

  return [
    ...run.commandPrefix,
    remoteLayout(config).binary,
    '-m',
    modelPath,
    '-d',
    run.targetDevice,
    '-api',
    run.api,
    '-niter',
    String(overrides.iterations ?? run.iterations),
    '-hint',
    run.hint,
    '-nthreads',
    String(spec.threads),
    '-nstreams',
    String(spec.streams),
    '-infer_precision',
    spec.precision,
    '-b',
    String(spec.batch),
  ]
}

/** Environment for the benchmark process on the device */
export function benchmarkEnv(config: BenchConfig): Record<string, string> {
  return { LD_LIBRARY_PATH: remoteLayout(config).libDir }
}
