import yargs from 'yargs'
import { hideBin } from 'yargs/helpers'
import { logger } from '../logger'
import { devicesCommand } from './commands/devices'
import { printConfigCommand } from './commands/print-config'
import { printMatrixCommand } from './commands/print-matrix'
import { runCommand } from './commands/run'

export function createCli(argv: string[] = hideBin(process.argv)) {
  return yargs(argv)
    .scriptName('edgebench')
    .usage('$0 <command> [options]')
    .option('config', {
      alias: 'c',
      type: 'string',
      describe: 'Path to a bench.config.{json,yaml,js} file',
      global: true,
    })
    .option('verbose', {
      alias: 'v',
      type: 'boolean',
      describe: 'Log device commands, retries and probes',
      global: true,
    })
    .option('quiet', {
      alias: 'q',
      type: 'boolean',
      describe: 'Print only results and warnings',
      global: true,
    })
    .middleware((args) => {
      if (args.verbose) {
        logger.setLevel('debug')
      } else if (args.quiet) {
        logger.setLevel('warn')
      }
    })
    .command(runCommand)
    .command(printConfigCommand)
    .command(printMatrixCommand)
    .command(devicesCommand)
    .demandCommand(1, 'Specify a command: run, print-config, print-matrix or devices')
    .epilogue('BENCH_* environment variables override values from the config file')
    .help()
    .alias('help', 'h')
    .version()
    .alias('version', 'V')
    .strict()
}

export async function runCli(argv?: string[]) {
  return createCli(argv).parseAsync()
}
