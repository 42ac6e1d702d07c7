import { describe, it, expect } from '@jest/globals'
import { StubDevice, syntheticBenchmarkOutput } from './stub-device'
import { DeviceUnreachableError } from '../core/errors'

describe('StubDevice', () => {
  it('should track directories and files as a tree', async () => {
    const device = new StubDevice('stub-1')

    await device.mkdir('/data/edgebench/runs/0')
    await device.push('/host/model.xml', '/data/edgebench/runs/0/model.xml')

    expect(device.listFiles('/data/edgebench/runs')).toEqual([
      '/data/edgebench/runs',
      '/data/edgebench/runs/0',
      '/data/edgebench/runs/0/model.xml',
    ])
    await expect(device.exists('/data/edgebench/runs/0/model.xml')).resolves.toBe(true)

    await device.remove('/data/edgebench/runs/0')

    expect(device.listFiles('/data/edgebench/runs')).toEqual(['/data/edgebench/runs'])
    expect(device.hasFile('/data/edgebench/runs/0/model.xml')).toBe(false)
  })

  it('should record every operation in order', async () => {
    const device = new StubDevice('stub-1')

    await device.mkdir('/a')
    await device.shell(['ls'], { timeoutMs: 100, cwd: '/a' })
    await device.exists('/b')

    expect(device.operations).toEqual([
      { op: 'mkdir', path: '/a' },
      { op: 'shell', argv: ['ls'], cwd: '/a', env: undefined },
      { op: 'exists', path: '/b', result: false },
    ])
  })

  it('should answer benchmark commands with synthetic output by default', async () => {
    const device = new StubDevice('stub-1')

    const result = await device.shell(['/x/benchmark_app', '-m', 'm.xml', '-nthreads', '4'], { timeoutMs: 100 })

    expect(result.exitCode).toBe(0)
    expect(result.stdout).toContain('Throughput:')
  })

  it('should delegate to a custom responder', async () => {
    const device = new StubDevice('stub-1', {
      responder: (argv) => ({ exitCode: 7, stdout: argv.join(','), stderr: '' }),
    })

    await expect(device.shell(['a', 'b'], { timeoutMs: 100 })).resolves.toEqual({
      exitCode: 7,
      stdout: 'a,b',
      stderr: '',
    })
  })

  it('should fail every operation while unreachable', async () => {
    const device = new StubDevice('stub-1')
    device.setReachable(false)

    await expect(device.info()).rejects.toBeInstanceOf(DeviceUnreachableError)
    await expect(device.mkdir('/a')).rejects.toBeInstanceOf(DeviceUnreachableError)
  })

  it('should return temperature readings in turn and repeat the last', async () => {
    const device = new StubDevice('stub-1', { temperatures: [70, 55] })

    await expect(device.temperature()).resolves.toBe(70)
    await expect(device.temperature()).resolves.toBe(55)
    await expect(device.temperature()).resolves.toBe(55)
  })

  it('should merge info overrides', async () => {
    const device = new StubDevice('stub-1', { info: { model: 'Test Board' } })

    await expect(device.info()).resolves.toEqual({ id: 'stub-1', kind: 'stub', os: 'stub', model: 'Test Board' })
  })
})

describe('syntheticBenchmarkOutput', () => {
  it('should scale latency with threads', () => {
    const output = syntheticBenchmarkOutput(['-nthreads', '4', '-nstreams', '1', '-b', '1', '-niter', '100'])

    // 40 / 4 + 2 * 1 = 12 ms median
    expect(output).toContain('Median:        12.00 ms')
    expect(output).toContain('Count:            100 iterations')
  })
})

describe('StubDevice push', () => {
  it('should place a pushed entry inside a directory given with a trailing slash', async () => {
    const device = new StubDevice('stub-1')

    await device.push('/host/bundle/bin', '/data/edgebench/')

    expect(device.hasFile('/data/edgebench/bin')).toBe(true)
  })
})
