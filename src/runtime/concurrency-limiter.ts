import { ConfigurationError } from '../config/environment'
import { metrics as defaultMetrics, type Metrics } from '../observability'

/**
 * ConcurrencyLimiter - counting semaphore with a FIFO waiter queue.
 *
 * A released permit is handed straight to the oldest waiter, so activeCount
 * never dips below the number of holders and late arrivals can't overtake.
 */
export class ConcurrencyLimiter {
  private active = 0
  private waiters: Array<() => void> = []
  private metrics: Metrics
  private name: string

  constructor(
    readonly maxPermits: number,
    options: { metrics?: Metrics; name?: string } = {}
  ) {
    if (!Number.isInteger(maxPermits) || maxPermits < 1) {
      throw new ConfigurationError(`maxPermits must be a positive integer, got ${maxPermits}`)
    }
    this.metrics = options.metrics ?? defaultMetrics
    this.name = options.name ?? 'default'
  }

  acquire(): Promise<void> {
    if (this.active < this.maxPermits) {
      this.setActive(this.active + 1)
      return Promise.resolve()
    }
    return new Promise<void>(resolve => this.waiters.push(resolve))
  }

  release(): void {
    if (this.active === 0) {
      throw new Error(`Limiter "${this.name}": release() without a matching acquire()`)
    }

    const next = this.waiters.shift()
    if (next) {
      // permit moves to the waiter; activeCount unchanged
      next()
    } else {
      this.setActive(this.active - 1)
    }
  }

  /**
   * Run `fn` while holding a permit
   */
  async use<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire()
    try {
      return await fn()
    } finally {
      this.release()
    }
  }

  get activeCount(): number {
    return this.active
  }

  get pending(): number {
    return this.waiters.length
  }

  private setActive(value: number): void {
    this.active = value
    this.metrics.gauge('limiter.active', value, { limiter: this.name })
  }
}
