import { BenchConfig } from '../types'
import { readFile, stat } from 'node:fs/promises'
import { dirname, extname, isAbsolute, join, resolve } from 'node:path'
import * as yaml from 'js-yaml'
import validateConfig from './validate'
import { ConfigLoadError } from './errors'

export const CONFIG_FILENAMES = [
  'bench.config.json',
  'bench.config.yaml',
  'bench.config.yml',
  'bench.config.js',
  'bench.config.cjs',
]

export interface LoadConfigOptions {
  cwd?: string
  /** Explicit file, relative to cwd; skips discovery */
  configPath?: string
  envPrefix?: string
  cliArgs?: Record<string, unknown>
}

type ConfigRecord = Record<string, unknown>

interface LoadedFile {
  path: string
  config: ConfigRecord
}

// Env suffix -> dotted config path
const ENV_OVERRIDES: ReadonlyArray<readonly [string, string]> = [
  ['CONCURRENCY', 'run.concurrency'],
  ['TIMEOUT_MS', 'run.timeoutMs'],
  ['COOLDOWN_MS', 'run.cooldownMs'],
  ['REPEATS', 'run.repeats'],
  ['MAX_ATTEMPTS', 'retry.maxAttempts'],
  ['DEPLOY_ROOT', 'deployRoot'],
  ['OUTPUT_DIR', 'report.dir'],
  ['OUTPUT_FORMATS', 'report.formats'],
]

/**
 * Resolves the run configuration. Later sources win:
 * 1. Config file (bench.config.{json,yaml,yml,js,cjs})
 * 2. `${envPrefix}*` environment variables
 * 3. CLI arguments
 *
 * A relative `bundle.root` is resolved against the config file's directory.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<BenchConfig> {
  const { cwd = process.cwd(), configPath, envPrefix = 'BENCH_', cliArgs = {} } = options

  const file = await readConfigFile(cwd, configPath)
  if (!file && Object.keys(cliArgs).length === 0) {
    throw new ConfigLoadError(
      `Failed to load config file: no configuration file found in ${cwd} (looked for ${CONFIG_FILENAMES.join(', ')})`,
    )
  }

  const merged = [file?.config ?? {}, readEnvOverrides(envPrefix), cliArgs].reduce(mergeConfig, {})
  const config = validateConfig(merged)

  if (!isAbsolute(config.bundle.root)) {
    config.bundle.root = resolve(file ? dirname(file.path) : cwd, config.bundle.root)
  }

  return config
}

async function findConfigFile(cwd: string): Promise<string | undefined> {
  for (const filename of CONFIG_FILENAMES) {
    const candidate = join(cwd, filename)
    const found = await stat(candidate).then(
      (stats) => stats.isFile(),
      () => false,
    )
    if (found) return candidate
  }
  return undefined
}

async function readConfigFile(cwd: string, configPath?: string): Promise<LoadedFile | undefined> {
  const path = configPath ? resolve(cwd, configPath) : await findConfigFile(cwd)
  if (!path) return undefined

  try {
    const parsed = await parseConfigFile(path)
    if (!isRecord(parsed)) {
      throw new Error('configuration must be an object')
    }
    return { path, config: parsed }
  } catch (error) {
    throw new ConfigLoadError(
      `Failed to load config file ${path}: ${error instanceof Error ? error.message : String(error)}`,
      { path, cause: error },
    )
  }
}

async function parseConfigFile(path: string): Promise<unknown> {
  switch (extname(path)) {
    case '.json':
      return JSON.parse(await readFile(path, 'utf-8'))
    case '.yaml':
    case '.yml':
      return yaml.load(await readFile(path, 'utf-8'))
    default: {
      const loaded: unknown = await import(path)
      return isRecord(loaded) && 'default' in loaded ? loaded.default : loaded
    }
  }
}

function readEnvOverrides(prefix: string): ConfigRecord {
  const overrides: ConfigRecord = {}

  for (const [suffix, configPath] of ENV_OVERRIDES) {
    const raw = process.env[`${prefix}${suffix}`]
    if (raw === undefined) continue

    let value = parseEnvValue(raw)
    // formats also take a plain list: "cli,json"
    if (configPath === 'report.formats' && typeof value === 'string') {
      value = value
        .split(',')
        .map((format) => format.trim())
        .filter(Boolean)
    }
    setPath(overrides, configPath.split('.'), value)
  }

  return overrides
}

/** Integers, booleans and JSON arrays or objects; anything else stays a string */
export function parseEnvValue(value: string): unknown {
  if (/^\d+$/.test(value)) return Number.parseInt(value, 10)

  const lower = value.toLowerCase()
  if (lower === 'true' || lower === 'false') return lower === 'true'

  if (value.startsWith('[') || value.startsWith('{')) {
    try {
      return JSON.parse(value)
    } catch {
      return value
    }
  }

  return value
}

function setPath(target: ConfigRecord, keys: string[], value: unknown): void {
  const [head, ...rest] = keys
  if (head === undefined) return

  if (rest.length === 0) {
    target[head] = value
    return
  }

  const child = target[head]
  const next: ConfigRecord = isRecord(child) ? child : {}
  target[head] = next
  setPath(next, rest, value)
}

/** Deep merge; arrays and scalars from `override` replace, undefined is skipped */
export function mergeConfig(base: ConfigRecord, override: ConfigRecord): ConfigRecord {
  const result: ConfigRecord = { ...base }

  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) continue
    const current = result[key]
    result[key] = isRecord(current) && isRecord(value) ? mergeConfig(current, value) : value
  }

  return result
}

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
