import { describe, it, expect, jest, beforeEach } from '@jest/globals'
import { BridgeDevice, parseGetprop } from './bridge-device'
import { runProcess, ProcessSpawnError } from './process'
import {
  CommandTimeoutError,
  DeviceNotFoundError,
  DeviceUnreachableError,
  ProcessError,
} from '../core/errors'
import { silentLogger } from '../logger'

jest.mock('./process', () => ({
  ...jest.requireActual<typeof import('./process')>('./process'),
  runProcess: jest.fn(),
}))

const mockRunProcess = jest.mocked(runProcess)

const ok = (stdout: string, code = 0) => ({ exitCode: 0, stdout: `${stdout}__EDGEBENCH_EXIT__${code}\n`, stderr: '' })

describe('BridgeDevice', () => {
  let device: BridgeDevice

  beforeEach(() => {
    jest.clearAllMocks()
    device = new BridgeDevice(
      { id: 'pixel', kind: 'bridge', serial: 'emulator-5554', adbPath: '/opt/adb', tags: [] },
      { logger: silentLogger },
    )
  })

  describe('shell', () => {
    it('should run the quoted line through adb shell with an exit marker', async () => {
      mockRunProcess.mockResolvedValue(ok('hello\n'))

      const result = await device.shell(['echo', 'hello world'], { timeoutMs: 5000 })

      expect(mockRunProcess).toHaveBeenCalledWith(
        '/opt/adb',
        ['-s', 'emulator-5554', 'shell', "echo 'hello world'; echo __EDGEBENCH_EXIT__$?"],
        { timeoutMs: 5000 },
      )
      expect(result).toEqual({ exitCode: 0, stdout: 'hello', stderr: '' })
    })

    it('should take the exit code from the marker rather than adb', async () => {
      mockRunProcess.mockResolvedValue(ok('', 3))

      const result = await device.shell(['false'], { timeoutMs: 1000 })

      expect(result.exitCode).toBe(3)
    })

    it('should pass cwd and env through the remote line', async () => {
      mockRunProcess.mockResolvedValue(ok(''))

      await device.shell(['./bin/benchmark_app'], {
        timeoutMs: 1000,
        cwd: '/data/local/tmp/edgebench',
        env: { LD_LIBRARY_PATH: '/data/local/tmp/edgebench/lib' },
      })

      const args = mockRunProcess.mock.calls[0]?.[1]
      expect(args?.[3]).toBe(
        'cd /data/local/tmp/edgebench && LD_LIBRARY_PATH=/data/local/tmp/edgebench/lib ./bin/benchmark_app; echo __EDGEBENCH_EXIT__$?',
      )
    })

    it('should classify an unknown serial as DeviceNotFoundError', async () => {
      mockRunProcess.mockResolvedValue({ exitCode: 1, stdout: '', stderr: "adb: device 'emulator-5554' not found\n" })

      await expect(device.shell(['true'], { timeoutMs: 1000 })).rejects.toBeInstanceOf(DeviceNotFoundError)
    })

    it('should classify offline devices as DeviceUnreachableError', async () => {
      mockRunProcess.mockResolvedValue({ exitCode: 1, stdout: '', stderr: 'adb: device offline\n' })

      await expect(device.shell(['true'], { timeoutMs: 1000 })).rejects.toBeInstanceOf(DeviceUnreachableError)
    })

    it('should classify a missing adb binary as DeviceUnreachableError', async () => {
      mockRunProcess.mockRejectedValue(new ProcessSpawnError('/opt/adb', new Error('spawn /opt/adb ENOENT')))

      await expect(device.shell(['true'], { timeoutMs: 1000 })).rejects.toBeInstanceOf(DeviceUnreachableError)
    })

    it('should let timeouts through unchanged', async () => {
      mockRunProcess.mockRejectedValue(new CommandTimeoutError('adb shell sleep 10', 1000))

      await expect(device.shell(['sleep', '10'], { timeoutMs: 1000 })).rejects.toBeInstanceOf(CommandTimeoutError)
    })
  })

  describe('file operations', () => {
    it('should report existence from the test exit code', async () => {
      mockRunProcess.mockResolvedValueOnce(ok('', 0)).mockResolvedValueOnce(ok('', 1))

      await expect(device.exists('/data/local/tmp/a')).resolves.toBe(true)
      await expect(device.exists('/data/local/tmp/b')).resolves.toBe(false)
    })

    it('should throw ProcessError when mkdir fails', async () => {
      mockRunProcess.mockResolvedValue({
        exitCode: 0,
        stdout: '__EDGEBENCH_EXIT__1\n',
        stderr: 'mkdir: Permission denied\n',
      })

      await expect(device.mkdir('/system/x')).rejects.toBeInstanceOf(ProcessError)
    })

    it('should push with adb push', async () => {
      mockRunProcess.mockResolvedValue({ exitCode: 0, stdout: '1 file pushed', stderr: '' })

      await device.push('/host/model.xml', '/data/local/tmp/edgebench/models/model.xml')

      expect(mockRunProcess).toHaveBeenCalledWith(
        '/opt/adb',
        ['-s', 'emulator-5554', 'push', '/host/model.xml', '/data/local/tmp/edgebench/models/model.xml'],
        { timeoutMs: 300000 },
      )
    })

    it('should throw ProcessError when a push fails for a local reason', async () => {
      mockRunProcess.mockResolvedValue({ exitCode: 1, stdout: '', stderr: "adb: error: cannot stat '/host/missing'\n" })

      await expect(device.push('/host/missing', '/data/x')).rejects.toBeInstanceOf(ProcessError)
    })
  })

  describe('info', () => {
    it('should parse getprop output', async () => {
      mockRunProcess.mockResolvedValue(
        ok(
          [
            '[ro.product.model]: [Pixel 7]',
            '[ro.product.manufacturer]: [Google]',
            '[ro.build.version.release]: [14]',
            '[ro.build.version.sdk]: [34]',
            '[ro.product.cpu.abi]: [arm64-v8a]',
            '',
          ].join('\n'),
        ),
      )

      await expect(device.info()).resolves.toEqual({
        id: 'pixel',
        kind: 'bridge',
        model: 'Pixel 7',
        manufacturer: 'Google',
        os: 'android',
        osVersion: '14',
        sdkVersion: '34',
        abi: 'arm64-v8a',
      })
    })
  })

  describe('temperature', () => {
    it('should convert millidegrees to degrees', async () => {
      mockRunProcess.mockResolvedValue(ok('45500\n'))

      await expect(device.temperature()).resolves.toBe(45.5)
    })

    it('should return undefined without a thermal zone', async () => {
      mockRunProcess.mockResolvedValue(ok('', 1))

      await expect(device.temperature()).resolves.toBeUndefined()
    })
  })

  it('should list animation and screen tuning commands', () => {
    expect(device.tuningCommands()).toEqual([
      ['settings', 'put', 'global', 'window_animation_scale', '0'],
      ['settings', 'put', 'global', 'transition_animation_scale', '0'],
      ['settings', 'put', 'global', 'animator_duration_scale', '0'],
      ['input', 'keyevent', 'KEYCODE_POWER'],
    ])
  })
})

describe('parseGetprop', () => {
  it('should skip lines that are not properties', () => {
    const props = parseGetprop('noise\n[a.b]: [1]\n[c]: []\n')

    expect([...props.entries()]).toEqual([
      ['a.b', '1'],
      ['c', ''],
    ])
  })
})
