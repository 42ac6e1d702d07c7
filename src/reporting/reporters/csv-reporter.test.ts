import { describe, it, expect } from '@jest/globals'
import { CSVReporter, escapeCell } from './csv-reporter'
import { createRecord, createSpec, createSummary } from '../../testing/results'

const HEADER = [
  'attempts',
  'batch',
  'deviceId',
  'durationMs',
  'exitCode',
  'failureKind',
  'failureMessage',
  'id',
  'index',
  'metrics.latencyAvgMs',
  'metrics.latencyMaxMs',
  'metrics.latencyMedianMs',
  'metrics.latencyMinMs',
  'metrics.parseStatus',
  'metrics.throughputFps',
  'modelId',
  'precision',
  'repeatIndex',
  'startedAt',
  'state',
  'status',
  'streams',
  'temperatureC',
  'threads',
].join(',')

describe('escapeCell', () => {
  it('should leave plain values alone', () => {
    expect(escapeCell('FP16')).toBe('FP16')
    expect(escapeCell(12.5)).toBe('12.5')
    expect(escapeCell(false)).toBe('false')
  })

  it('should render missing values as empty cells', () => {
    expect(escapeCell(undefined)).toBe('')
  })

  it('should quote commas, quotes and line breaks', () => {
    expect(escapeCell('a,b')).toBe('"a,b"')
    expect(escapeCell('say "hi"')).toBe('"say ""hi"""')
    expect(escapeCell('one\ntwo')).toBe('"one\ntwo"')
  })
})

describe('CSVReporter', () => {
  it('should write a sorted header and one row per record', () => {
    const summary = createSummary([createRecord(createSpec())])

    const lines = new CSVReporter().generate(summary).split('\r\n')

    expect(lines).toHaveLength(3)
    expect(lines[0]).toBe(HEADER)
    expect(lines[1]).toBe(
      '1,1,dev-a,1500,0,,,dev-a/net/t4-s1-FP16-b1#0,0,10.5,15,10,9,ok,100,net,FP16,0,2026-01-01T00:00:00.000Z,succeeded,success,1,,4',
    )
    expect(lines[2]).toBe('')
  })

  it('should leave metric columns empty for records without them', () => {
    const summary = createSummary([
      createRecord(createSpec({ index: 0 })),
      createRecord(createSpec({ index: 1, threads: 8 }), 'failed'),
    ])

    const lines = new CSVReporter().generate(summary).split('\r\n')

    expect(lines[2]).toBe(
      '1,1,dev-a,1500,1,ProcessError,benchmark exited with code 1,dev-a/net/t8-s1-FP16-b1#0,1,,,,,failed,,net,FP16,0,2026-01-01T00:00:00.000Z,failed,process-error,1,,8',
    )
  })

  it('should quote failure messages that need it', () => {
    const record = {
      ...createRecord(createSpec(), 'failed'),
      failure: { kind: 'ProcessError' as const, message: 'exit 1, "bad" output' },
    }

    const output = new CSVReporter().generate(createSummary([record]))

    expect(output).toContain(',ProcessError,"exit 1, ""bad"" output",')
  })

  it('should prefix rows with the run id when configured', () => {
    const lines = new CSVReporter({ includeRunId: true })
      .generate(createSummary([createRecord(createSpec())]))
      .split('\r\n')

    expect(lines[0]).toBe(`runId,${HEADER}`)
    expect(lines[1]?.startsWith('run-1,1,1,dev-a,')).toBe(true)
  })

  it('should produce only a header for an empty run', () => {
    expect(new CSVReporter().generate(createSummary([]))).toBe('\r\n')
  })
})
