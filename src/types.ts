/**
 * Ref - opaque reference to a child resource (an absolute URL for the HTTP client)
 */
export type Ref = string

/**
 * DetailRecord - resolved child resource. Fields beyond `name` pass through untouched.
 */
export interface DetailRecord {
  name: string
  [field: string]: unknown
}

export type OutputMode = 'eager' | 'stream'

/**
 * RetryPolicy - Configuration for retry behavior
 */
export interface RetryPolicy {
  maxRetries: number // additional attempts after the first
  initialDelayMs: number
  maxDelayMs: number
  backoffMultiplier: number
  retryableErrors?: string[] // If specified, only retry errors with these names
}

/**
 * Default retry policies for different scenarios
 */
export const DEFAULT_RETRY_POLICIES: Record<'fetch' | 'none', RetryPolicy> = {
  // Remote fetches
  fetch: {
    maxRetries: 3,
    initialDelayMs: 200,
    maxDelayMs: 5000,
    backoffMultiplier: 2,
  },

  // No retries
  none: {
    maxRetries: 0,
    initialDelayMs: 0,
    maxDelayMs: 0,
    backoffMultiplier: 1,
  },
}

/**
 * Largest delay a Node timer honours; anything above fires after 1ms
 */
export const MAX_TIMEOUT_MS = 2_147_483_647
