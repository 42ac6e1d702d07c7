import type { CommandModule } from 'yargs'
import * as yaml from 'js-yaml'
import { loadConfig } from '../../core/config'
import { consoleIO, reportError, setExitCode } from '../io'
import type { BaseArgs, CommandIO, PrintConfigArgs } from '../types'

export const printConfigCommand: CommandModule<BaseArgs, PrintConfigArgs> = {
  command: 'print-config',
  describe: 'Show the resolved and validated configuration',
  builder: (yargs) => {
    return yargs.option('format', {
      alias: 'f',
      type: 'string',
      choices: ['json', 'yaml'] as const,
      default: 'json' as const,
      describe: 'Output format for the configuration',
    })
  },
  handler: async (argv) => {
    setExitCode(await printConfig(argv, consoleIO()))
  },
}

export async function printConfig(args: PrintConfigArgs, io: CommandIO): Promise<number> {
  try {
    const config = await loadConfig({ cwd: io.cwd, configPath: args.config })

    io.out(args.format === 'yaml' ? yaml.dump(config, { skipInvalid: true }).trimEnd() : JSON.stringify(config, null, 2))

    if (!args.quiet) {
      io.err('✓ Configuration is valid')
    }
    return 0
  } catch (error) {
    return reportError(error, io)
  }
}
