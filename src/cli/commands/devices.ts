import type { CommandModule } from 'yargs'
import pc from 'picocolors'
import { loadConfig } from '../../core/config'
import { errorMessage } from '../../core/errors'
import type { DeviceHealth, DeviceInfo } from '../../core/types'
import { DevicePool, createDeviceFactory } from '../../devices'
import { logger } from '../../logger'
import { consoleIO, reportError, setExitCode } from '../io'
import type { BaseArgs, CommandIO, DevicesArgs } from '../types'

export const devicesCommand: CommandModule<BaseArgs, DevicesArgs> = {
  command: 'devices',
  describe: 'Probe every configured device and show its health',
  builder: (yargs) =>
    yargs
      .option('json', {
        type: 'boolean',
        default: false,
        describe: 'Print the health report as JSON',
      })
      .option('dry-run', {
        type: 'boolean',
        default: false,
        describe: 'Probe in-memory stubs instead of real devices',
      }),
  handler: async (argv) => {
    setExitCode(await listDevices(argv, consoleIO()))
  },
}

/**
 * Exits with 1 when any device could not be reached
 */
export async function listDevices(args: DevicesArgs, io: CommandIO, pool?: DevicePool): Promise<number> {
  try {
    const config = await loadConfig({ cwd: io.cwd, configPath: args.config })
    const devices =
      pool ?? new DevicePool(config.devices, { factory: createDeviceFactory({ logger, dryRun: args.dryRun }), logger })

    for (const id of devices.ids()) {
      try {
        await devices.resolve(id)
      } catch (error) {
        logger.debug(`Probe of ${id} failed: ${errorMessage(error)}`)
      }
    }

    const report = devices.healthReport()

    if (args.json) {
      io.out(JSON.stringify(report, null, 2))
    } else {
      for (const entry of report) {
        io.out(`${entry.id.padEnd(16)} ${formatHealth(entry.health)} ${summarizeInfo(entry.info)}`.trimEnd())
      }
    }

    return report.every((entry) => entry.health === 'reachable') ? 0 : 1
  } catch (error) {
    return reportError(error, io)
  }
}

function formatHealth(health: DeviceHealth): string {
  const label = health.padEnd(11)
  if (!pc.isColorSupported) return label
  return health === 'reachable' ? pc.green(label) : health === 'unknown' ? pc.yellow(label) : pc.red(label)
}

function summarizeInfo(info: DeviceInfo | undefined): string {
  if (!info) return ''
  const parts = [
    [info.manufacturer, info.model].filter(Boolean).join(' '),
    [info.os, info.osVersion].filter(Boolean).join(' '),
    info.abi ?? info.arch,
    info.cpuCores === undefined ? undefined : `${info.cpuCores} cores`,
  ]
  return parts.filter((part): part is string => Boolean(part)).join(', ')
}
