import { describe, it, expect } from '@jest/globals'
import { CLIReporter } from './cli-reporter'
import { createRecord, createSpec, createSummary } from '../../testing/results'

describe('CLIReporter', () => {
  const reporter = new CLIReporter({ showColors: false })

  describe('generate', () => {
    it('should generate report for empty results', () => {
      const output = reporter.generate(createSummary([]))

      expect(output).toContain('✗ FAILED Benchmark Results for run-1 (5.0s)')
      expect(output).toContain('Invocations: 0 expected, 0 recorded, 0 succeeded, 0 failed, 0 timed out')
      expect(output).not.toContain('Invocation |')
    })

    it('should render one row per record with formatted metrics', () => {
      const summary = createSummary([createRecord(createSpec())])

      const lines = reporter.generate(summary).split('\n')

      expect(lines[0]).toBe('✓ PASSED Benchmark Results for run-1 (5.0s)')
      expect(lines[2]).toBe(
        '#      | Invocation                | State  | FPS    | Median  | Avg     | Attempts',
      )
      expect(lines[4]).toBe(
        '0      | dev-a/net/t4-s1-FP16-b1#0 | OK     | 100.00 | 10.00ms | 10.50ms | 1       ',
      )
    })

    it('should show dashes for metrics a failed invocation never produced', () => {
      const summary = createSummary([createRecord(createSpec(), 'failed')])

      const output = reporter.generate(summary)

      expect(output).toContain('0      | dev-a/net/t4-s1-FP16-b1#0 | FAILED | -      | -      | -      | 1       ')
    })

    it('should list failures with their kind and message', () => {
      const summary = createSummary([
        createRecord(createSpec({ index: 0 })),
        createRecord(createSpec({ index: 1, threads: 8 }), 'failed'),
        createRecord(createSpec({ index: 2, threads: 2 }), 'timed-out'),
      ])

      const output = reporter.generate(summary)

      expect(output).toContain('Invocations: 3 expected, 3 recorded, 1 succeeded, 1 failed, 1 timed out')
      expect(output).toContain('Failed Invocations:')
      expect(output).toContain('  • dev-a/net/t8-s1-FP16-b1#0: ProcessError: benchmark exited with code 1')
      expect(output).toContain('  • dev-a/net/t2-s1-FP16-b1#0: Timeout: Command timed out after 1000ms')
      expect(output).toContain('| TIMEOUT |')
    })

    it('should mention a cancelled run', () => {
      const summary = createSummary([createRecord(createSpec())], { cancelled: true, expectedInvocations: 4 })

      const output = reporter.generate(summary)

      expect(output).toContain('✗ FAILED')
      expect(output).toContain('Invocations: 4 expected, 1 recorded')
      expect(output).toContain('Run was cancelled before all invocations finished')
    })

    it('should add statistics across repeats', () => {
      const summary = createSummary([
        createRecord(createSpec({ index: 0, repeatIndex: 0, repeats: 2 }), 'succeeded', { throughputFps: 100 }),
        createRecord(createSpec({ index: 1, repeatIndex: 1, repeats: 2 }), 'succeeded', { throughputFps: 120 }),
      ])

      const output = reporter.generate(summary)

      expect(output).toContain('Across repeats:')
      expect(output).toContain('dev-a/net/t4-s1-FP16-b1 | 2/2    | 110.00   | 100.00-120.00 | 10.00ms')
    })

    it('should skip repeat statistics when every combination ran once', () => {
      const output = reporter.generate(createSummary([createRecord(createSpec())]))

      expect(output).not.toContain('Across repeats:')
    })

    it('should truncate long invocation ids', () => {
      const narrow = new CLIReporter({ showColors: false, maxIdLength: 12 })

      const output = narrow.generate(createSummary([createRecord(createSpec())]))

      expect(output).toContain('| dev-a/net... |')
    })
  })
})
