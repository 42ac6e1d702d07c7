import { mkdir, writeFile } from 'fs/promises'
import { dirname } from 'path'
import type { ResultRecord, RunSummary } from '../../core/types/reporting'

export interface CSVReporterOptions {
  /** Prepend the run id as the first column of every row */
  includeRunId?: boolean
}

type CsvValue = string | number | boolean | undefined

/**
 * One row per record; the header is the sorted union of every row's columns
 */
export class CSVReporter {
  private options: Required<CSVReporterOptions>

  constructor(options: CSVReporterOptions = {}) {
    this.options = {
      includeRunId: options.includeRunId ?? false,
    }
  }

  generate(summary: RunSummary): string {
    const rows = summary.records.map((record) => this.flattenRecord(record))
    const columns = [...new Set(rows.flatMap((row) => Object.keys(row)))].sort()
    const header = this.options.includeRunId ? ['runId', ...columns] : columns

    const lines = [header.map(escapeCell).join(',')]
    for (const row of rows) {
      const cells = columns.map((column) => escapeCell(row[column]))
      lines.push((this.options.includeRunId ? [escapeCell(summary.manifest.runId), ...cells] : cells).join(','))
    }

    return lines.join('\r\n') + '\r\n'
  }

  async writeFile(summary: RunSummary, filePath: string): Promise<void> {
    await mkdir(dirname(filePath), { recursive: true })
    await writeFile(filePath, this.generate(summary), 'utf-8')
  }

  private flattenRecord(record: ResultRecord): Record<string, CsvValue> {
    const { spec, outcome } = record
    const row: Record<string, CsvValue> = {
      index: record.index,
      id: spec.id,
      deviceId: spec.deviceId,
      modelId: spec.modelId,
      threads: spec.threads,
      streams: spec.streams,
      precision: spec.precision,
      batch: spec.batch,
      repeatIndex: spec.repeatIndex,
      state: record.state,
      status: outcome.status,
      exitCode: outcome.exitCode,
      attempts: outcome.attempts,
      durationMs: outcome.durationMs,
      temperatureC: record.temperatureC,
      startedAt: record.startedAt.toISOString(),
      failureKind: record.failure?.kind,
      failureMessage: record.failure?.message,
    }

    for (const [name, value] of Object.entries(record.metrics)) {
      row[`metrics.${name}`] = value
    }

    if (record.device?.model) {
      row['device.model'] = record.device.model
    }

    return row
  }
}

/**
 * RFC 4180 quoting: fields with a comma, quote or line break are wrapped in
 * double quotes and embedded quotes are doubled
 */
export function escapeCell(value: CsvValue): string {
  if (value === undefined) return ''
  const text = String(value)
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text
}
