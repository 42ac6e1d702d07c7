import { EventEmitter } from 'events'
import type { Logger } from '../logger'
import { logger as defaultLogger } from '../logger'
import { errorMessage } from './errors'
import { sleep } from './utils/sleep'

/** Items that must run one after another, e.g. everything for one device */
export interface Lane<T> {
  key: string
  items: T[]
}

export interface SchedulerEvents<T, R> {
  laneStart: (key: string, size: number) => void
  taskStart: (item: T, lane: string) => void
  taskComplete: (result: R, lane: string) => void
  cooldown: (lane: string, ms: number) => void
  laneComplete: (key: string) => void
  allTasksComplete: (results: R[]) => void
}

export interface SchedulerConfig {
  /** Lanes running at the same time */
  concurrency: number
  /** Pause between consecutive items of one lane */
  cooldownMs: number
  signal?: AbortSignal
  logger?: Logger
}

export interface SchedulerRunResult<R> {
  results: R[]
  cancelled: boolean
}

/**
 * Runs lanes concurrently up to the concurrency cap; items inside a lane
 * run strictly in order. Once cancelled no further item is dispatched,
 * while the items already running are allowed to finish.
 */
export class Scheduler<T, R> extends EventEmitter {
  private readonly config: SchedulerConfig
  private readonly logger: Logger
  private lanes: Lane<T>[] = []
  private activeLanes = new Set<string>()
  private completed = 0
  private isRunning = false
  private stopped = false
  private taskHandler?: (item: T, lane: string) => Promise<R>
  private laneSetup?: (lane: Lane<T>) => Promise<void>

  constructor(config: SchedulerConfig) {
    super()
    this.config = config
    this.logger = config.logger ?? defaultLogger
  }

  setTaskHandler(handler: (item: T, lane: string) => Promise<R>): void {
    this.taskHandler = handler
  }

  /** Runs once at the start of each lane, before its first item */
  setLaneSetup(setup: (lane: Lane<T>) => Promise<void>): void {
    this.laneSetup = setup
  }

  addLane(key: string, items: T[]): void {
    const existing = this.lanes.find((lane) => lane.key === key)
    if (existing) {
      existing.items.push(...items)
    } else {
      this.lanes.push({ key, items: [...items] })
    }
  }

  async run(): Promise<SchedulerRunResult<R>> {
    if (this.isRunning) {
      throw new Error('Scheduler is already running')
    }

    const handler = this.taskHandler
    if (!handler) {
      throw new Error('Task handler must be set before running scheduler')
    }

    this.isRunning = true
    this.stopped = false
    this.completed = 0

    const results: R[] = []
    const queue = this.lanes
    this.lanes = []

    const workerCount = Math.max(1, Math.min(this.config.concurrency, queue.length))
    const workers = Array.from({ length: workerCount }, async () => {
      for (let lane = queue.shift(); lane; lane = queue.shift()) {
        await this.runLane(lane, handler, results)
      }
    })

    try {
      const settled = await Promise.allSettled(workers)
      const failure = settled.find((outcome): outcome is PromiseRejectedResult => outcome.status === 'rejected')
      if (failure) {
        throw failure.reason
      }
    } finally {
      this.isRunning = false
    }

    this.emit('allTasksComplete', results)
    return { results, cancelled: this.cancelled() }
  }

  stop(): void {
    this.stopped = true
  }

  getStatus() {
    return {
      isRunning: this.isRunning,
      queuedLanes: this.lanes.length,
      activeLanes: this.activeLanes.size,
      completedTasks: this.completed,
    }
  }

  private async runLane(lane: Lane<T>, handler: (item: T, lane: string) => Promise<R>, results: R[]): Promise<void> {
    this.activeLanes.add(lane.key)
    this.emit('laneStart', lane.key, lane.items.length)

    try {
      if (this.laneSetup && !this.cancelled()) {
        await this.laneSetup(lane)
      }

      for (const [position, item] of lane.items.entries()) {
        if (this.cancelled()) break

        if (position > 0 && this.config.cooldownMs > 0) {
          this.emit('cooldown', lane.key, this.config.cooldownMs)
          if (!(await sleep(this.config.cooldownMs, this.config.signal))) break
        }

        this.emit('taskStart', item, lane.key)
        const result = await handler(item, lane.key)
        results.push(result)
        this.completed++
        this.emit('taskComplete', result, lane.key)
      }
    } catch (error) {
      this.logger.error(`Unexpected error in lane ${lane.key}: ${errorMessage(error)}`)
      throw error
    } finally {
      this.activeLanes.delete(lane.key)
      this.emit('laneComplete', lane.key)
    }
  }

  private cancelled(): boolean {
    return this.stopped || (this.config.signal?.aborted ?? false)
  }
}

export function createScheduler<T, R>(config: SchedulerConfig): Scheduler<T, R> {
  return new Scheduler<T, R>(config)
}
