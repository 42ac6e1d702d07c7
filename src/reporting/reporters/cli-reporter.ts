import type { RepeatSummary, ResultRecord, RunSummary } from '../../core/types/reporting'
import pc from 'picocolors'

export interface CLIReporterOptions {
  showColors?: boolean
  showAggregates?: boolean
  maxIdLength?: number
}

/**
 * CLI Reporter that displays benchmark results in a human-readable table format
 */
export class CLIReporter {
  private options: Required<CLIReporterOptions>

  constructor(options: CLIReporterOptions = {}) {
    this.options = {
      showColors: options.showColors ?? true,
      showAggregates: options.showAggregates ?? true,
      maxIdLength: options.maxIdLength ?? 60,
    }
  }

  generate(summary: RunSummary): string {
    const lines: string[] = []

    lines.push(this.formatHeader(summary))
    lines.push('')

    if (summary.records.length > 0) {
      lines.push(this.formatTable(summary.records))
      lines.push('')
    }

    if (this.options.showAggregates && summary.aggregates.some((aggregate) => aggregate.repeats > 1)) {
      lines.push(this.formatAggregates(summary.aggregates))
      lines.push('')
    }

    lines.push(this.formatSummary(summary))

    return lines.join('\n')
  }

  print(summary: RunSummary): void {
    // eslint-disable-next-line no-console
    console.log(this.generate(summary))
  }

  private formatHeader(summary: RunSummary): string {
    const status = summary.passed ? this.colorize('✓ PASSED', 'green') : this.colorize('✗ FAILED', 'red')
    const duration = `${(summary.manifest.durationMs / 1000).toFixed(1)}s`

    return `${status} Benchmark Results for ${summary.manifest.runId} (${duration})`
  }

  private formatTable(records: ResultRecord[]): string {
    const headers = ['#', 'Invocation', 'State', 'FPS', 'Median', 'Avg', 'Attempts']
    return this.renderTable(
      headers,
      records.map((record) => this.formatDataRow(record)),
    )
  }

  private formatDataRow(record: ResultRecord): string[] {
    const { metrics } = record
    return [
      String(record.index),
      this.truncateId(record.spec.id),
      this.formatState(record.state),
      this.formatNumber(metrics.throughputFps),
      this.formatLatency(metrics.latencyMedianMs),
      this.formatLatency(metrics.latencyAvgMs),
      String(record.outcome.attempts),
    ]
  }

  private formatAggregates(aggregates: RepeatSummary[]): string {
    const headers = ['Combination', 'Runs', 'FPS mean', 'FPS range', 'Median']
    const rows = aggregates.map((aggregate) => [
      this.truncateId(aggregate.key),
      `${aggregate.succeeded}/${aggregate.repeats}`,
      this.formatNumber(aggregate.throughputFps?.mean),
      aggregate.throughputFps
        ? `${aggregate.throughputFps.min.toFixed(2)}-${aggregate.throughputFps.max.toFixed(2)}`
        : '-',
      this.formatLatency(aggregate.latencyMedianMs),
    ])

    return [this.colorize('Across repeats:', 'blue'), this.renderTable(headers, rows)].join('\n')
  }

  private renderTable(headers: string[], rows: string[][]): string {
    const colWidths = this.calculateColumnWidths(headers, rows)
    const lines = [this.formatRow(headers, colWidths), this.formatSeparator(colWidths)]

    for (const row of rows) {
      lines.push(this.formatRow(row, colWidths))
    }

    return lines.join('\n')
  }

  private formatState(state: ResultRecord['state']): string {
    switch (state) {
      case 'succeeded':
        return this.colorize('OK', 'green')
      case 'timed-out':
        return this.colorize('TIMEOUT', 'yellow')
      case 'failed':
        return this.colorize('FAILED', 'red')
    }
  }

  private formatNumber(value: number | undefined): string {
    return value === undefined ? '-' : value.toFixed(2)
  }

  private formatLatency(value: number | undefined): string {
    return value === undefined ? '-' : `${value.toFixed(2)}ms`
  }

  private calculateColumnWidths(headers: string[], rows: string[][]): number[] {
    const widths = headers.map((header) => header.length)

    for (const row of rows) {
      row.forEach((cell, index) => {
        widths[index] = Math.max(widths[index] ?? 0, this.stripColors(cell).length)
      })
    }

    return widths.map((width) => Math.max(width, 6)) // Minimum 6 chars
  }

  private formatRow(cells: string[], widths: number[]): string {
    return cells
      .map((cell, index) => {
        const padding = (widths[index] ?? 0) - this.stripColors(cell).length
        return cell + ' '.repeat(Math.max(0, padding))
      })
      .join(' | ')
  }

  private formatSeparator(widths: number[]): string {
    return widths.map((width) => '-'.repeat(width)).join('-+-')
  }

  private formatSummary(summary: RunSummary): string {
    const { manifest } = summary
    const lines: string[] = []

    lines.push(
      `Invocations: ${manifest.expectedInvocations} expected, ${manifest.recordedInvocations} recorded, ` +
        `${manifest.succeeded} succeeded, ${manifest.failed} failed, ${manifest.timedOut} timed out`,
    )

    if (manifest.cancelled) {
      lines.push(this.colorize('Run was cancelled before all invocations finished', 'yellow'))
    }

    const failed = summary.records.filter((record) => record.state !== 'succeeded')
    if (failed.length > 0) {
      lines.push('')
      lines.push(this.colorize('Failed Invocations:', 'red'))

      for (const record of failed) {
        const reason = record.failure ? `${record.failure.kind}: ${record.failure.message}` : record.state
        lines.push(`  • ${record.spec.id}: ${reason}`)
      }
    }

    return lines.join('\n')
  }

  private truncateId(id: string): string {
    if (id.length <= this.options.maxIdLength) {
      return id
    }
    return id.slice(0, this.options.maxIdLength - 3) + '...'
  }

  private colorize(text: string, color: 'green' | 'red' | 'yellow' | 'blue'): string {
    if (!this.options.showColors) {
      return text
    }

    switch (color) {
      case 'green':
        return pc.green(text)
      case 'red':
        return pc.red(text)
      case 'yellow':
        return pc.yellow(text)
      case 'blue':
        return pc.blue(text)
    }
  }

  private stripColors(text: string): string {
    // eslint-disable-next-line no-control-regex
    return text.replace(/\x1b\[[0-9;]*m/g, '')
  }
}
