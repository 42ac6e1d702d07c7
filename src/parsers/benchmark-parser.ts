import { LATENCY_FIELDS, MetricsRecord } from '../core/types/metrics'

type LatencyField = (typeof LATENCY_FIELDS)[number]

const NUMBER = String.raw`(\d+(?:\.\d+)?(?:[eE][+-]?\d+)?)`
const UNIT = String.raw`(ms|us|µs|s)\b`

const THROUGHPUT = new RegExp(String.raw`Throughput:\s*${NUMBER}\s*FPS`, 'i')
const INLINE_LATENCY = new RegExp(String.raw`\b(Average|Avg|Median|Min|Max) latency:\s*${NUMBER}\s*${UNIT}`, 'i')
const LATENCY_HEADER = /^Latency:\s*$/i
const BLOCK_LATENCY = new RegExp(String.raw`^(Average|Avg|Median|Min|Max):\s*${NUMBER}\s*${UNIT}`, 'i')
const COUNT = new RegExp(String.raw`\bCount:\s*${NUMBER}(?:\s*iterations)?`, 'i')
const DURATION = new RegExp(String.raw`\bDuration:\s*${NUMBER}\s*${UNIT}`, 'i')
const MAX_RSS = /Maximum resident set size \(kbytes\):\s*(\d+)/i
const CPU_PERCENT = /Percent of CPU this job got:\s*(\d+(?:\.\d+)?)%/i
const TOOL_ERROR = /\[\s*ERROR\s*\]\s*(.*)$/

const LATENCY_LABELS: Record<string, LatencyField> = {
  average: 'latencyAvgMs',
  avg: 'latencyAvgMs',
  median: 'latencyMedianMs',
  min: 'latencyMinMs',
  max: 'latencyMaxMs',
}

export function toMilliseconds(value: number, unit: string): number {
  switch (unit.toLowerCase()) {
    case 'us':
    case 'µs':
      return value / 1000
    case 's':
      return value * 1000
    default:
      return value
  }
}

// Strips log-level and step prefixes such as "[ INFO ]" or "[Step 11/11]"
function stripPrefix(line: string): string {
  return line.replace(/^(?:\s*\[[^\]]*\])+/, '').trim()
}

/**
 * Turns benchmark tool output into a MetricsRecord.
 *
 * Without a throughput line the record is `failed` and carries no values.
 * With throughput but any latency statistic missing it is `partial`.
 * Lines that match no known pattern are ignored, and the first occurrence
 * of each value wins.
 */
export function parseBenchmarkOutput(stdout: string, stderr = ''): MetricsRecord {
  const values: Omit<MetricsRecord, 'parseStatus'> = {}
  const setOnce = <K extends keyof typeof values>(key: K, value: (typeof values)[K]) => {
    if (values[key] === undefined) values[key] = value
  }

  let inLatencyBlock = false

  for (const rawLine of `${stdout}\n${stderr}`.split(/\r?\n/)) {
    const line = stripPrefix(rawLine)

    if (LATENCY_HEADER.test(line)) {
      inLatencyBlock = true
      continue
    }

    if (inLatencyBlock) {
      const block = BLOCK_LATENCY.exec(line)
      const field = block?.[1] ? LATENCY_LABELS[block[1].toLowerCase()] : undefined
      if (block?.[2] && block[3] && field) {
        setOnce(field, toMilliseconds(parseFloat(block[2]), block[3]))
        continue
      }
      inLatencyBlock = false
    }

    const throughput = THROUGHPUT.exec(line)
    if (throughput?.[1]) {
      setOnce('throughputFps', parseFloat(throughput[1]))
      continue
    }

    const inline = INLINE_LATENCY.exec(line)
    const inlineField = inline?.[1] ? LATENCY_LABELS[inline[1].toLowerCase()] : undefined
    if (inline?.[2] && inline[3] && inlineField) {
      setOnce(inlineField, toMilliseconds(parseFloat(inline[2]), inline[3]))
      continue
    }

    const count = COUNT.exec(line)
    if (count?.[1]) {
      setOnce('iterations', Math.round(parseFloat(count[1])))
      continue
    }

    const duration = DURATION.exec(line)
    if (duration?.[1] && duration[2]) {
      setOnce('durationMs', toMilliseconds(parseFloat(duration[1]), duration[2]))
      continue
    }

    const rss = MAX_RSS.exec(line)
    if (rss?.[1]) {
      setOnce('peakMemoryKb', parseInt(rss[1], 10))
      continue
    }

    const cpu = CPU_PERCENT.exec(line)
    if (cpu?.[1]) {
      setOnce('cpuUtilizationPct', parseFloat(cpu[1]))
    }
  }

  if (values.throughputFps === undefined) {
    return { parseStatus: 'failed' }
  }

  const complete = LATENCY_FIELDS.every((field) => values[field] !== undefined)
  return { parseStatus: complete ? 'ok' : 'partial', ...values }
}

/**
 * First `[ ERROR ]` message the tool printed, if any
 */
export function detectToolError(stdout: string, stderr = ''): string | undefined {
  for (const line of `${stdout}\n${stderr}`.split(/\r?\n/)) {
    const match = TOOL_ERROR.exec(line)
    if (match) {
      return match[1]?.trim() || line.trim()
    }
  }
  return undefined
}
