import { z } from 'zod'

const nonEmpty = <T extends z.ZodTypeAny>(item: T, label: string) =>
  z.array(item).min(1, `${label} must contain at least one value`)

export const RunMatrixSchema = z.object({
  threads: nonEmpty(z.number().int().positive(), 'matrix.threads').default([4]),
  streams: nonEmpty(z.number().int().positive(), 'matrix.streams').default([1]),
  precision: nonEmpty(z.string().min(1), 'matrix.precision').default(['FP16']),
  batch: nonEmpty(z.number().int().positive(), 'matrix.batch').default([1]),
  devices: z.array(z.string()).optional(), // subset of configured device ids
  models: z.array(z.string()).optional(), // subset of configured model ids
})

export type RunMatrix = z.infer<typeof RunMatrixSchema>

export const ThermalConfigSchema = z.object({
  maxTemperatureC: z.number().positive(),
  pollMs: z.number().int().positive().default(5000),
  maxWaitMs: z.number().int().nonnegative().default(120000),
})

export type ThermalConfig = z.infer<typeof ThermalConfigSchema>

export const RunConfigSchema = z.object({
  matrix: RunMatrixSchema.default({}),
  repeats: z.number().int().positive().default(1),
  timeoutMs: z.number().int().positive().default(120000),
  cooldownMs: z.number().int().nonnegative().default(0),
  concurrency: z.number().int().positive().optional(), // defaults to the number of devices
  targetDevice: z.string().default('CPU'), // value of the tool's -d flag
  api: z.enum(['sync', 'async']).default('sync'),
  iterations: z.number().int().positive().default(200),
  hint: z.enum(['none', 'latency', 'throughput', 'cumulative_throughput']).default('none'),
  commandPrefix: z.array(z.string()).default([]), // e.g. ['taskset', 'f0']
  tuneDevice: z.boolean().default(false),
  warmup: z.boolean().default(false),
  thermal: ThermalConfigSchema.optional(),
})

export type RunConfig = z.infer<typeof RunConfigSchema>

export const RetryConfigSchema = z.object({
  maxAttempts: z.number().int().positive().default(3),
  backoffMs: z.number().int().nonnegative().default(1000),
  factor: z.number().min(1).default(2),
  maxBackoffMs: z.number().int().nonnegative().default(30000),
})

export type RetryConfig = z.infer<typeof RetryConfigSchema>
