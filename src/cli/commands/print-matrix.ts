import type { CommandModule } from 'yargs'
import { loadConfig } from '../../core/config'
import { buildBenchmarkCommand, remoteModelPath, scratchDir } from '../../core/command-builder'
import { countInvocations, expandDimensions, validateMatrix } from '../../core/matrix'
import type { BenchConfig, InvocationSpec } from '../../core/types'
import { quoteArgs } from '../../devices'
import { consoleIO, reportError, setExitCode } from '../io'
import type { BaseArgs, CommandIO, PrintMatrixArgs } from '../types'
import { selectionOptions } from './run'

export const printMatrixCommand: CommandModule<BaseArgs, PrintMatrixArgs> = {
  command: 'print-matrix',
  describe: 'List the expanded invocations and their commands without touching devices',
  builder: (yargs) =>
    selectionOptions(yargs).option('json', {
      type: 'boolean',
      default: false,
      describe: 'Print the invocations as a JSON array',
    }),
  handler: async (argv) => {
    setExitCode(await printMatrix(argv, consoleIO()))
  },
}

export async function printMatrix(args: PrintMatrixArgs, io: CommandIO): Promise<number> {
  try {
    const config = await loadConfig({ cwd: io.cwd, configPath: args.config })
    const dimensions = validateMatrix(config, { devices: args.device, models: args.model })
    const rows = [...expandDimensions(dimensions)].map((spec) => ({ ...spec, command: commandFor(config, spec) }))

    if (args.json) {
      io.out(JSON.stringify(rows, null, 2))
    } else {
      for (const row of rows) {
        io.out(`${row.index}\t${row.id}\t${quoteArgs(row.command)}`)
      }
    }

    if (!args.quiet) {
      io.err(`${countInvocations(dimensions)} invocation(s)`)
    }
    return 0
  } catch (error) {
    return reportError(error, io)
  }
}

function commandFor(config: BenchConfig, spec: InvocationSpec): string[] {
  const model = config.models.find((candidate) => candidate.id === spec.modelId)
  if (!model) {
    throw new Error(`Unknown model "${spec.modelId}"`)
  }
  return buildBenchmarkCommand(config, spec, remoteModelPath(config, model, scratchDir(config, spec.index)))
}
