/**
 * Environment Configuration with Validation
 *
 * Centralizes environment variable overrides and provides fail-fast validation.
 * Use this instead of directly accessing process.env throughout the codebase.
 */

import { LogLevelSchema, validateConfig, type FanoutConfig } from './schema'

export class ConfigurationError extends Error {
  public readonly details?: {
    key?: string
    value?: string
    searchedPaths?: string[]
  }

  constructor(message: string, details?: ConfigurationError['details']) {
    super(message)
    this.name = 'ConfigurationError'
    this.details = details
  }
}

function readInteger(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = env[key]
  if (raw === undefined || raw === '') return undefined

  if (!/^\d+$/.test(raw.trim())) {
    throw new ConfigurationError(`${key} must be a non-negative integer, got "${raw}"`, { key, value: raw })
  }
  return parseInt(raw, 10)
}

/**
 * Apply FANOUT_* environment overrides on top of a parsed config.
 * The result is validated again so overrides obey the same schema.
 */
export function applyEnvironment(config: FanoutConfig, env: NodeJS.ProcessEnv = process.env): FanoutConfig {
  const maxPermits = readInteger(env, 'FANOUT_MAX_PERMITS')
  const maxRetries = readInteger(env, 'FANOUT_MAX_RETRIES')
  const lockTimeoutMs = readInteger(env, 'FANOUT_LOCK_TIMEOUT_MS')
  const requestTimeoutMs = readInteger(env, 'FANOUT_REQUEST_TIMEOUT_MS')

  let level = config.logging.level
  if (env.FANOUT_LOG_LEVEL) {
    const parsed = LogLevelSchema.safeParse(env.FANOUT_LOG_LEVEL)
    if (!parsed.success) {
      throw new ConfigurationError(`FANOUT_LOG_LEVEL is not a valid level: "${env.FANOUT_LOG_LEVEL}"`, {
        key: 'FANOUT_LOG_LEVEL',
        value: env.FANOUT_LOG_LEVEL,
      })
    }
    level = parsed.data
  }

  return validateConfig({
    client: {
      ...config.client,
      baseUrl: env.FANOUT_BASE_URL || config.client.baseUrl,
      requestTimeoutMs: requestTimeoutMs ?? config.client.requestTimeoutMs,
    },
    pipeline: {
      ...config.pipeline,
      maxPermits: maxPermits ?? config.pipeline.maxPermits,
      lockTimeoutMs: lockTimeoutMs ?? config.pipeline.lockTimeoutMs,
    },
    retry: {
      ...config.retry,
      maxRetries: maxRetries ?? config.retry.maxRetries,
    },
    logging: {
      ...config.logging,
      level,
    },
  })
}
