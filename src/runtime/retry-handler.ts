import type { RetryPolicy } from '../types'
import type { FetchTask } from '../task/fetch-task'
import { FetchFailedError, toError } from '../errors'
import { logger as defaultLogger, metrics as defaultMetrics, type Logger, type Metrics } from '../observability'

/**
 * RetryHandler - Manages retry logic for remote fetches
 *
 * Features:
 * - Exponential backoff with jitter
 * - Configurable retry policies
 * - Attempt tracking on the FetchTask, surfaced through logs and metrics
 */
export class RetryHandler {
  constructor(
    private defaultPolicy: RetryPolicy,
    private logger: Logger = defaultLogger,
    private metrics: Metrics = defaultMetrics,
    private sleep: (ms: number) => Promise<void> = ms => new Promise(resolve => setTimeout(resolve, ms))
  ) {}

  /**
   * Calculate delay for next retry using exponential backoff
   */
  calculateDelay(retryCount: number, policy: RetryPolicy = this.defaultPolicy): number {
    const baseDelay = policy.initialDelayMs * Math.pow(policy.backoffMultiplier, retryCount)
    const cappedDelay = Math.min(baseDelay, policy.maxDelayMs)

    // ±25% jitter
    const jitter = cappedDelay * 0.25 * (Math.random() * 2 - 1)

    return Math.max(0, Math.floor(cappedDelay + jitter))
  }

  /**
   * Check if error is retryable based on policy
   */
  isRetryable(error: Error, policy: RetryPolicy = this.defaultPolicy): boolean {
    // If no specific retryable errors defined, retry all
    if (!policy.retryableErrors || policy.retryableErrors.length === 0) {
      return true
    }

    return policy.retryableErrors.includes(error.name)
  }

  /**
   * Run `operation` for `task` until it succeeds or retries run out.
   * @throws FetchFailedError carrying the last underlying error
   */
  async execute<T>(
    task: FetchTask,
    operation: () => Promise<T>,
    options: { policy?: RetryPolicy; logger?: Logger } = {}
  ): Promise<T> {
    const effectivePolicy = options.policy || this.defaultPolicy
    const log = (options.logger ?? this.logger).child({ taskId: task.taskId, kind: task.kind, target: task.target })

    for (let attempt = 0; attempt <= effectivePolicy.maxRetries; attempt++) {
      task.beginAttempt()
      this.metrics.increment('fetch.attempts', 1, { kind: task.kind })
      if (attempt > 0) {
        this.metrics.increment('fetch.retry', 1, { kind: task.kind })
      }

      try {
        const result = await operation()
        task.succeed()
        log.debug({ attempt: task.attemptCount }, 'Fetch succeeded')
        return result
      } catch (error) {
        const lastError = toError(error)

        if (attempt === effectivePolicy.maxRetries || !this.isRetryable(lastError, effectivePolicy)) {
          task.fail(lastError)
          this.metrics.increment('fetch.failed', 1, { kind: task.kind })
          log.warn({ attempt: task.attemptCount, err: lastError }, 'Fetch failed, giving up')
          throw new FetchFailedError(task.target, task.attemptCount, lastError)
        }

        const delay = this.calculateDelay(attempt, effectivePolicy)
        log.info({ attempt: task.attemptCount, delayMs: delay, err: lastError }, 'Fetch failed, retrying')
        await this.sleep(delay)
      }
    }

    // only reachable with a negative maxRetries
    const exhausted = new Error('Retry policy allows no attempts')
    task.fail(exhausted)
    throw new FetchFailedError(task.target, task.attemptCount, exhausted)
  }
}
