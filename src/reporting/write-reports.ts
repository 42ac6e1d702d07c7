import { join, resolve } from 'path'
import type { OutputConfig } from '../core/types/bench-config'
import type { RunSummary } from '../core/types/reporting'
import type { Logger } from '../logger'
import { CSVReporter, JSONReporter } from './reporters'

export interface WriteReportsOptions {
  cwd?: string
  logger?: Logger
}

/**
 * Writes the file formats listed in the output config (json, csv).
 * The cli format is printed by the caller. Returns the written paths.
 */
export async function writeReports(
  summary: RunSummary,
  output: OutputConfig,
  options: WriteReportsOptions = {},
): Promise<string[]> {
  const dir = resolve(options.cwd ?? process.cwd(), output.dir)
  const basename = output.filename ?? summary.manifest.runId
  const written: string[] = []

  if (output.formats.includes('json')) {
    const path = join(dir, `${basename}.json`)
    await new JSONReporter({ includeRaw: output.includeRaw, includeAggregates: output.aggregate, prettyPrint: true }).writeFile(
      summary,
      path,
    )
    written.push(path)
  }

  if (output.formats.includes('csv')) {
    const path = join(dir, `${basename}.csv`)
    await new CSVReporter().writeFile(summary, path)
    written.push(path)
  }

  for (const path of written) {
    options.logger?.info(`Report written to ${path}`)
  }

  return written
}
