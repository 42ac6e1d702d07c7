/**
 * POSIX sh quoting for arguments that travel inside a remote command line.
 * Values outside a safe character set are wrapped in single quotes;
 * embedded single quotes become '\''.
 */
export function quoteArg(value: string): string {
  if (value === '') return "''"
  if (/^[A-Za-z0-9_@%+=:,./-]+$/.test(value)) return value
  return `'${value.replace(/'/g, `'\\''`)}'`
}

export function quoteArgs(argv: readonly string[]): string {
  return argv.map(quoteArg).join(' ')
}

const ENV_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/

export interface RemoteLineOptions {
  cwd?: string
  env?: Record<string, string>
}

/**
 * Builds `cd <cwd> && NAME=value ... <argv>` with every piece quoted.
 * Env names are validated since they cannot be quoted.
 */
export function buildRemoteLine(argv: readonly string[], options: RemoteLineOptions = {}): string {
  if (argv.length === 0) {
    throw new Error('Cannot build a remote command from an empty argv')
  }

  const parts: string[] = []

  for (const [name, value] of Object.entries(options.env ?? {})) {
    if (!ENV_NAME.test(name)) {
      throw new Error(`Invalid environment variable name: ${name}`)
    }
    parts.push(`${name}=${quoteArg(value)}`)
  }

  parts.push(quoteArgs(argv))
  const command = parts.join(' ')

  return options.cwd ? `cd ${quoteArg(options.cwd)} && ${command}` : command
}

// Paths handed to scp may be expanded by the remote shell on older servers
const SAFE_REMOTE_PATH = /^[A-Za-z0-9_@%+=:,./-]+$/

export function assertSafeRemotePath(path: string): string {
  if (!SAFE_REMOTE_PATH.test(path)) {
    throw new Error(`Remote path contains characters that are not allowed for file transfer: ${path}`)
  }
  return path
}
