import { BenchConfig, BenchConfigSchema } from '../types'
import { ConfigValidationError } from './errors'

/**
 * Parses a raw config object, applying schema defaults.
 * @throws ConfigValidationError listing every issue
 */
export default function validateConfig(config: unknown): BenchConfig {
  const result = BenchConfigSchema.safeParse(config)
  if (!result.success) {
    throw new ConfigValidationError(result.error.issues)
  }
  return result.data
}
