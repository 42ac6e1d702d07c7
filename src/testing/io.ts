import { mkdtemp, rm, writeFile } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'
import type { CommandIO } from '../cli/types'

export interface TestIO extends CommandIO {
  stdout: string[]
  stderr: string[]
}

export function createTestIO(cwd: string): TestIO {
  const stdout: string[] = []
  const stderr: string[] = []
  return {
    cwd,
    stdout,
    stderr,
    out: (line) => stdout.push(line),
    err: (line) => stderr.push(line),
  }
}

/** Raw config with one stub device, suitable for writing to disk */
export function rawTestConfig(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    project: { name: 'cli-project', runId: 'nightly' },
    devices: [{ id: 'dev-a', kind: 'stub' }],
    models: [{ id: 'net', path: 'models/net.xml' }],
    bundle: { root: '.' },
    run: { matrix: { threads: [1, 2] }, timeoutMs: 1000 },
    retry: { maxAttempts: 1, backoffMs: 0 },
    ...overrides,
  }
}

export async function createTempDir(prefix: string): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix))
}

export async function writeConfig(dir: string, config: unknown, filename = 'bench.config.json'): Promise<string> {
  const path = join(dir, filename)
  await writeFile(path, typeof config === 'string' ? config : JSON.stringify(config, null, 2))
  return path
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true })
}
