/**
 * CLI command definitions and interfaces
 */

export interface BaseArgs {
  config?: string
  verbose?: boolean
  quiet?: boolean
}

/** Narrows the matrix to some devices or models */
export interface SelectionArgs extends BaseArgs {
  device?: string[]
  model?: string[]
}

export interface RunArgs extends SelectionArgs {
  dryRun?: boolean
}

export interface PrintConfigArgs extends BaseArgs {
  format?: 'json' | 'yaml'
}

export interface PrintMatrixArgs extends SelectionArgs {
  json?: boolean
}

export interface DevicesArgs extends BaseArgs {
  json?: boolean
  dryRun?: boolean
}

/** Where command output goes; tests swap in collectors */
export interface CommandIO {
  cwd: string
  out: (line: string) => void
  err: (line: string) => void
}
