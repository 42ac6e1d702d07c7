import { z } from 'zod'

export const ModelConfigSchema = z.object({
  id: z.string().min(1, 'Model id is required'),
  name: z.string().optional(),
  path: z.string().min(1, 'Model path is required'), // relative paths resolve against bundle.root
  files: z.array(z.string()).default([]), // companion files, e.g. weights
  precision: z.string().optional(),
  tags: z.record(z.string(), z.string()).default({}),
  persist: z.boolean().default(true), // keep resident under <deployRoot>/models
})

export type ModelConfig = z.infer<typeof ModelConfigSchema>
