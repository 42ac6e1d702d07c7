export type ParseStatus = 'ok' | 'partial' | 'failed'

/**
 * Metrics parsed from benchmark tool output. A field the parser could not
 * find stays undefined; zero is a real measurement.
 */
export interface MetricsRecord {
  parseStatus: ParseStatus
  throughputFps?: number
  latencyAvgMs?: number
  latencyMedianMs?: number
  latencyMinMs?: number
  latencyMaxMs?: number
  iterations?: number
  durationMs?: number
  peakMemoryKb?: number
  cpuUtilizationPct?: number
}

export const LATENCY_FIELDS = ['latencyAvgMs', 'latencyMedianMs', 'latencyMinMs', 'latencyMaxMs'] as const

export function emptyMetrics(): MetricsRecord {
  return { parseStatus: 'failed' }
}
