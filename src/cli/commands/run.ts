import type { Argv, CommandModule } from 'yargs'
import { loadConfig } from '../../core/config'
import { createRunner, Runner } from '../../core/runner'
import type { AttemptRecord, InvocationSpec, ResultRecord, RunSummary } from '../../core/types'
import { CLIReporter, JSONReporter, writeReports } from '../../reporting'
import { logger } from '../../logger'
import { consoleIO, reportError, setExitCode } from '../io'
import type { BaseArgs, CommandIO, RunArgs } from '../types'

export function selectionOptions<T>(yargs: Argv<T>) {
  return yargs
    .option('device', {
      alias: 'd',
      type: 'string',
      array: true,
      describe: 'Run only on the given device id (repeatable)',
    })
    .option('model', {
      alias: 'm',
      type: 'string',
      array: true,
      describe: 'Run only the given model id (repeatable)',
    })
}

export const runCommand: CommandModule<BaseArgs, RunArgs> = {
  command: 'run',
  describe: 'Run the benchmark matrix on the configured devices',
  builder: (yargs) =>
    selectionOptions(yargs)
      .option('dry-run', {
        type: 'boolean',
        default: false,
        describe: 'Replace every device with an in-memory stub',
      })
      .example('$0 run', 'Run the whole matrix')
      .example('$0 run --device pixel-7', 'Run only on one device')
      .example('$0 run --model mobilenet --dry-run', 'Check one model without touching hardware'),
  handler: async (argv) => {
    setExitCode(await runBenchmarks(argv, consoleIO()))
  },
}

/**
 * Executes the configured matrix and writes the reports. Returns the exit
 * code: 0 when every invocation succeeded, 1 otherwise.
 */
export async function runBenchmarks(args: RunArgs, io: CommandIO): Promise<number> {
  const controller = new AbortController()
  const onSignal = (signal: NodeJS.Signals) => {
    logger.warn(`Received ${signal}, finishing in-flight invocations...`)
    controller.abort()
  }

  process.once('SIGINT', onSignal)
  process.once('SIGTERM', onSignal)

  try {
    const config = await loadConfig({ cwd: io.cwd, configPath: args.config })
    const runner = createRunner(config, {
      logger,
      dryRun: args.dryRun,
      selection: { devices: args.device, models: args.model },
    })

    if (!args.quiet) {
      setupProgressHandlers(runner)
    }

    const { summary } = await runner.run(controller.signal)

    if (args.quiet) {
      io.out(new JSONReporter({ prettyPrint: true }).generate(summary))
    } else if (config.report.formats.includes('cli')) {
      io.out(new CLIReporter({ showAggregates: config.report.aggregate }).generate(summary))
    }

    await writeReports(summary, config.report, { cwd: io.cwd, logger })

    return summary.passed ? 0 : 1
  } catch (error) {
    return reportError(error, io)
  } finally {
    process.removeListener('SIGINT', onSignal)
    process.removeListener('SIGTERM', onSignal)
  }
}

function setupProgressHandlers(runner: Runner): void {
  let total = 0
  let started = 0

  runner.on('runStart', (expected: number) => {
    total = expected
    logger.info(`Starting ${expected} invocation(s)`)
  })

  runner.on('invocationStart', (spec: InvocationSpec) => {
    started++
    logger.info(`[${started}/${total}] Running ${spec.id}`)
  })

  runner.on('invocationComplete', (record: ResultRecord) => {
    if (record.state === 'succeeded') {
      const fps = record.metrics.throughputFps
      logger.info(`Completed ${record.spec.id}: ${fps === undefined ? '-' : fps.toFixed(2)} FPS`)
    } else {
      const label = record.state === 'timed-out' ? 'Timed out' : 'Failed'
      logger.error(`${label}: ${record.spec.id} - ${record.failure?.message ?? record.state}`)
    }
  })

  runner.on('invocationRetry', (spec: InvocationSpec, attempt: number, delayMs: number, previous: AttemptRecord) => {
    logger.info(`Retry ${attempt} of ${spec.id} in ${delayMs}ms after ${previous.status}`)
  })

  runner.on('runComplete', (summary: RunSummary) => {
    const { succeeded, failed, timedOut } = summary.manifest
    logger.info(`Benchmarks completed: ${succeeded} succeeded, ${failed} failed, ${timedOut} timed out`)
  })
}
