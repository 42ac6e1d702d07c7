import { z } from 'zod'
import { DeviceTargetSchema } from './device'
import { ModelConfigSchema } from './model'
import { RunConfigSchema, RetryConfigSchema } from './run'

export const ProjectConfigSchema = z.object({
  name: z.string().min(1, 'Project name is required'),
  runId: z.string().min(1, 'Run id is required'),
  description: z.string().optional(),
})

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>

// Packaged bundle on the host: <root>/<binary>, <root>/<libDir>
export const BundleConfigSchema = z.object({
  root: z.string().min(1, 'Bundle root is required'),
  binary: z.string().default('bin/benchmark_app'),
  libDir: z.string().default('lib'),
})

export type BundleConfig = z.infer<typeof BundleConfigSchema>

export const OutputConfigSchema = z.object({
  dir: z.string().default('./bench-results'),
  formats: z.array(z.enum(['cli', 'json', 'csv'])).default(['cli']),
  filename: z.string().optional(),
  includeRaw: z.boolean().default(false), // keep stdout/stderr in JSON output
  aggregate: z.boolean().default(true), // add per-combination statistics
})

export type OutputConfig = z.infer<typeof OutputConfigSchema>

export const BenchConfigSchema = z
  .object({
    project: ProjectConfigSchema,
    devices: z.array(DeviceTargetSchema).min(1, 'At least one device is required'),
    models: z.array(ModelConfigSchema).min(1, 'At least one model is required'),
    bundle: BundleConfigSchema,
    deployRoot: z.string().min(1).default('/data/local/tmp/edgebench'),
    run: RunConfigSchema.default({}),
    retry: RetryConfigSchema.default({}),
    report: OutputConfigSchema.default({}),
  })
  .superRefine((config, ctx) => {
    const seen = new Set<string>()
    config.devices.forEach((device, index) => {
      if (seen.has(device.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate device id "${device.id}"`,
          path: ['devices', index, 'id'],
        })
      }
      seen.add(device.id)
    })

    const models = new Set<string>()
    config.models.forEach((model, index) => {
      if (models.has(model.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate model id "${model.id}"`,
          path: ['models', index, 'id'],
        })
      }
      models.add(model.id)
    })
  })

export type BenchConfig = z.infer<typeof BenchConfigSchema>
export type BenchConfigInput = z.input<typeof BenchConfigSchema>
