/**
 * Fetch Pipeline
 *
 * Fetches a root's ordered child references, then each child's detail:
 * - one run per rootId at a time (LockManager)
 * - at most maxPermits detail fetches in flight (ConcurrencyLimiter, shared across runs)
 * - results in child-reference order, whatever order the fetches complete in
 *
 * Failure policy: abort. The first child whose retries run out fails the run.
 * Nothing new is dispatched after that, tasks still queued for a permit are
 * skipped, and fetches already in flight are awaited before the lock is released.
 */

import { v4 as uuidv4 } from 'uuid'
import type { ResourceClient } from '../client/resource-client'
import type { LockManager } from '../storage/lock-manager'
import type { ConcurrencyLimiter } from '../runtime/concurrency-limiter'
import type { DetailRecord, Ref, RetryPolicy } from '../types'
import { RetryHandler } from '../runtime/retry-handler'
import { FetchTask } from '../task/fetch-task'
import { toError } from '../errors'
import {
  logger as defaultLogger,
  metrics as defaultMetrics,
  measureAsync,
  type Logger,
  type Metrics,
} from '../observability'

export interface FetchPipelineOptions {
  client: ResourceClient
  lockManager: LockManager
  limiter: ConcurrencyLimiter
  retryPolicy: RetryPolicy
  lockTimeoutMs: number
  /** Detail fetches a stream keeps dispatched ahead of its consumer (default: limiter.maxPermits) */
  prefetch?: number
  logger?: Logger
  metrics?: Metrics
  /** Called once per FetchTask when it reaches succeeded or failed */
  onTaskSettled?: (task: FetchTask) => void
  /** Backoff sleep, replaceable in tests */
  sleep?: (ms: number) => Promise<void>
}

/**
 * PipelineRun - state of one run(rootId) call
 */
export interface PipelineRun {
  runId: string
  rootId: string
  refs: Ref[]
  details: Array<DetailRecord | undefined>
  log: Logger
}

type Settled =
  | { ok: true; detail: DetailRecord }
  | { ok: false; error: Error }
  | { ok: 'skipped' }

/**
 * Shared by every fetch of one run; set as soon as any of them fails
 */
interface AbortState {
  aborted: boolean
}

export class FetchPipeline {
  private client: ResourceClient
  private lockManager: LockManager
  private limiter: ConcurrencyLimiter
  private lockTimeoutMs: number
  private prefetch: number
  private logger: Logger
  private metrics: Metrics
  private retryHandler: RetryHandler
  private onTaskSettled?: (task: FetchTask) => void

  constructor(options: FetchPipelineOptions) {
    this.client = options.client
    this.lockManager = options.lockManager
    this.limiter = options.limiter
    this.lockTimeoutMs = options.lockTimeoutMs
    this.prefetch = Math.max(1, options.prefetch ?? options.limiter.maxPermits)
    this.logger = options.logger ?? defaultLogger
    this.metrics = options.metrics ?? defaultMetrics
    this.onTaskSettled = options.onTaskSettled
    this.retryHandler = new RetryHandler(options.retryPolicy, this.logger, this.metrics, options.sleep)
  }

  /**
   * Child references of `rootId`, retried per the retry policy
   * @throws FetchFailedError once retries are exhausted
   */
  fetchChildren(rootId: string, log: Logger = this.logger): Promise<Ref[]> {
    return this.track(new FetchTask('children', rootId), () => this.client.getChildren(rootId), log)
  }

  /**
   * Detail of a single child, retried per the retry policy
   * @throws FetchFailedError once retries are exhausted
   */
  fetchDetail(ref: Ref, log: Logger = this.logger): Promise<DetailRecord> {
    return this.track(new FetchTask('detail', ref), () => this.client.getDetail(ref), log)
  }

  /**
   * Eager mode: every detail, in child-reference order
   */
  async run(rootId: string): Promise<DetailRecord[]> {
    const run = this.createRun(rootId)

    return measureAsync(this.metrics, 'pipeline.run', () =>
      this.lockManager.withLock(rootId, this.lockTimeoutMs, async () => {
        run.log.info('Run started')
        run.refs = await this.fetchChildren(rootId, run.log)
        run.details = new Array<DetailRecord | undefined>(run.refs.length)

        const abort: AbortState = { aborted: false }
        const failures: Error[] = []
        await Promise.all(
          run.refs.map((ref, index) =>
            this.dispatch(ref, run.log, abort).then(settled => {
              if (settled.ok === true) {
                run.details[index] = settled.detail
              } else if (settled.ok === false) {
                failures.push(settled.error)
              }
            })
          )
        )

        if (failures.length > 0) {
          run.log.error({ err: failures[0], failed: failures.length }, 'Run aborted')
          throw failures[0]
        }

        run.log.info({ count: run.refs.length }, 'Run completed')
        return run.details.filter(isDetail)
      }), { mode: 'eager' })
  }

  /**
   * Streaming mode: details yielded one at a time in child-reference order.
   *
   * Up to `prefetch` fetches are dispatched ahead of the consumer, each still
   * gated by the shared limiter. The root lock is held until the generator
   * finishes, throws, or is closed by the consumer.
   */
  async *stream(rootId: string): AsyncGenerator<DetailRecord, void, undefined> {
    const run = this.createRun(rootId)
    const start = Date.now()
    let status = 'ok'

    const window: Array<Promise<Settled>> = []
    const abort: AbortState = { aborted: false }
    let locked = false

    try {
      await this.lockManager.acquire(rootId, this.lockTimeoutMs)
      locked = true
      run.log.info({ prefetch: this.prefetch }, 'Stream started')
      run.refs = await this.fetchChildren(rootId, run.log)

      let next = 0
      const fill = () => {
        while (!abort.aborted && next < run.refs.length && window.length < this.prefetch) {
          window.push(this.dispatch(run.refs[next], run.log, abort))
          next++
        }
      }

      fill()
      while (window.length > 0) {
        const head = window[0]
        const settled = await head
        window.shift()

        if (settled.ok === false) {
          run.log.error({ err: settled.error }, 'Stream aborted')
          throw settled.error
        }
        if (settled.ok === 'skipped') {
          continue
        }

        fill()
        yield settled.detail
      }

      run.log.info({ count: run.refs.length }, 'Stream completed')
    } catch (error) {
      status = 'error'
      if (!locked) {
        run.log.warn({ err: error }, 'Stream could not lock root')
      }
      throw error
    } finally {
      if (locked) {
        abort.aborted = true
        // drain: no fetch of this run outlives its lock
        await Promise.all(window)
        this.lockManager.release(rootId)
      }
      this.metrics.timing('pipeline.run', Date.now() - start, status === 'ok' ? { mode: 'stream' } : { mode: 'stream', status })
    }
  }

  private createRun(rootId: string): PipelineRun {
    const runId = uuidv4()
    return {
      runId,
      rootId,
      refs: [],
      details: [],
      log: this.logger.child({ runId, rootId }),
    }
  }

  /**
   * Fetch one detail through the limiter. Never rejects: the outcome is
   * returned instead. The abort flag is checked once the permit is granted,
   * and set before a failed fetch gives its permit back.
   */
  private dispatch(ref: Ref, log: Logger, abort: AbortState): Promise<Settled> {
    return this.limiter.use(async (): Promise<Settled> => {
      if (abort.aborted) {
        log.debug({ ref }, 'Skipping fetch after abort')
        return { ok: 'skipped' }
      }
      try {
        return { ok: true, detail: await this.fetchDetail(ref, log) }
      } catch (error) {
        abort.aborted = true
        return { ok: false, error: toError(error) }
      }
    })
  }

  private async track<T>(task: FetchTask, operation: () => Promise<T>, log: Logger): Promise<T> {
    try {
      return await this.retryHandler.execute(task, operation, { logger: log })
    } finally {
      if (task.settled) {
        this.onTaskSettled?.(task)
      }
    }
  }
}

function isDetail(detail: DetailRecord | undefined): detail is DetailRecord {
  return detail !== undefined
}
