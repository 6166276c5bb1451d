/**
 * Pipeline Factory - wires config into concrete components
 */

import type { FanoutConfig } from '../config/schema'
import type { ResourceClient } from '../client/resource-client'
import type { LockManager } from '../storage/lock-manager'
import { HttpResourceClient } from '../client/http-resource-client'
import { InMemoryLockManager } from '../storage/in-memory-lock-manager'
import { ConcurrencyLimiter } from '../runtime/concurrency-limiter'
import { FetchPipeline } from './fetch-pipeline'
import { OutputSequencer, type DetailFormatter } from './output-sequencer'
import { logger as defaultLogger, metrics as defaultMetrics, type Logger, type Metrics } from '../observability'

export interface PipelineComponents {
  client: ResourceClient
  lockManager: LockManager
  limiter: ConcurrencyLimiter
  pipeline: FetchPipeline
  sequencer: OutputSequencer
}

/**
 * Build a pipeline from config. Any component passed in is used as-is,
 * so several pipelines can share one lock manager or limiter.
 */
export function createPipeline(
  config: FanoutConfig,
  overrides: {
    client?: ResourceClient
    lockManager?: LockManager
    limiter?: ConcurrencyLimiter
    logger?: Logger
    metrics?: Metrics
    format?: DetailFormatter
  } = {}
): PipelineComponents {
  const logger = overrides.logger ?? defaultLogger
  const metrics = overrides.metrics ?? defaultMetrics

  const client = overrides.client ?? new HttpResourceClient(config.client)
  const lockManager = overrides.lockManager ?? new InMemoryLockManager({ logger })
  const limiter = overrides.limiter ?? new ConcurrencyLimiter(config.pipeline.maxPermits, { metrics, name: 'detail' })

  const pipeline = new FetchPipeline({
    client,
    lockManager,
    limiter,
    retryPolicy: config.retry,
    lockTimeoutMs: config.pipeline.lockTimeoutMs,
    prefetch: config.pipeline.prefetch,
    logger,
    metrics,
  })

  return {
    client,
    lockManager,
    limiter,
    pipeline,
    sequencer: new OutputSequencer(pipeline, overrides.format),
  }
}
