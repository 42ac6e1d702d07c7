import type { ZodIssue } from 'zod'

/** A config file could not be found, read or parsed */
export class ConfigLoadError extends Error {
  readonly path?: string

  constructor(message: string, options: { path?: string; cause?: unknown } = {}) {
    super(message, { cause: options.cause })
    this.name = 'ConfigLoadError'
    this.path = options.path
  }
}

/** The merged configuration does not match BenchConfigSchema */
export class ConfigValidationError extends Error {
  readonly issues: ZodIssue[]

  constructor(issues: ZodIssue[]) {
    super(`Configuration validation failed with ${issues.length} issue(s)`)
    this.name = 'ConfigValidationError'
    this.issues = issues
  }

  /** One `path: message` line per issue */
  getErrorSummary(): string {
    return this.issues
      .map((issue) => {
        const path = issue.path.map(String).join('.')
        return path ? `${path}: ${issue.message}` : issue.message
      })
      .join('\n')
  }
}
