/**
 * Zod schemas for fanout runtime configuration
 * Validates YAML config files and environment overrides
 */

import { z } from 'zod'
import { MAX_TIMEOUT_MS } from '../types'

/**
 * Remote resource client configuration
 */
export const ClientConfigSchema = z.object({
  baseUrl: z.string().url().default('https://swapi-api.hbtn.io/api'),
  rootPath: z.string().includes('{id}').default('/films/{id}/'),
  childrenField: z.string().min(1).default('characters'),
  requestTimeoutMs: z.number().int().positive().max(MAX_TIMEOUT_MS).default(10000), // 10 seconds
})

export type ClientConfig = z.infer<typeof ClientConfigSchema>

/**
 * Pipeline concurrency configuration
 */
export const PipelineConfigSchema = z.object({
  maxPermits: z.number().int().positive().default(5),
  lockTimeoutMs: z.number().int().nonnegative().max(MAX_TIMEOUT_MS).default(30000), // 30 seconds
  prefetch: z.number().int().positive().optional(), // defaults to maxPermits
})

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>

/**
 * Retry policy applied to every remote call
 */
export const RetryConfigSchema = z.object({
  maxRetries: z.number().int().min(0).default(3),
  initialDelayMs: z.number().int().min(0).default(200),
  maxDelayMs: z.number().int().min(0).default(5000),
  backoffMultiplier: z.number().min(1).default(2),
  retryableErrors: z.array(z.string()).optional(),
})

export type RetryConfig = z.infer<typeof RetryConfigSchema>

export const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])

export type LogLevel = z.infer<typeof LogLevelSchema>

/**
 * Logging configuration
 */
export const LoggingConfigSchema = z.object({
  level: LogLevelSchema.default('info'),
  pretty: z.boolean().default(false),
})

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>

/**
 * Complete fanout configuration
 */
export const FanoutConfigSchema = z.object({
  client: ClientConfigSchema.default({}),
  pipeline: PipelineConfigSchema.default({}),
  retry: RetryConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
})

export type FanoutConfig = z.infer<typeof FanoutConfigSchema>

/**
 * Validate and parse config with defaults
 */
export function validateConfig(config: unknown): FanoutConfig {
  return FanoutConfigSchema.parse(config ?? {})
}

/**
 * Validate config with detailed error messages
 */
export function validateConfigSafe(config: unknown): { success: true; data: FanoutConfig } | { success: false; errors: string[] } {
  const result = FanoutConfigSchema.safeParse(config ?? {})

  if (result.success) {
    return { success: true, data: result.data }
  }

  const errors = result.error.issues.map(err => {
    const path = err.path.join('.')
    return `${path}: ${err.message}`
  })

  return { success: false, errors }
}
