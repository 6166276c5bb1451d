/**
 * Stable error codes surfaced by the pipeline and the CLI.
 */
export type ErrorCode =
  | 'USAGE'
  | 'LOCK_TIMEOUT'
  | 'NETWORK'
  | 'HTTP_STATUS'
  | 'FETCH_FAILED'

/**
 * Base class for every error raised by fanout
 */
export class FanoutError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = 'FanoutError'
  }
}

/**
 * Missing or invalid command line argument
 */
export class UsageError extends FanoutError {
  constructor(message: string) {
    super('USAGE', message)
    this.name = 'UsageError'
  }
}

/**
 * Lock not obtained within the requested timeout
 */
export class LockTimeoutError extends FanoutError {
  constructor(
    public readonly key: string,
    public readonly timeoutMs: number
  ) {
    super('LOCK_TIMEOUT', `Timed out after ${timeoutMs}ms waiting for lock "${key}"`)
    this.name = 'LockTimeoutError'
  }
}

/**
 * Transport-level failure: connection refused, timeout, unreadable payload
 */
export class NetworkError extends FanoutError {
  constructor(
    message: string,
    public readonly url: string,
    cause?: unknown
  ) {
    super('NETWORK', message, { cause })
    this.name = 'NetworkError'
  }
}

/**
 * Remote service answered with a non-success status.
 * The HTTP status code is `status`; `code` stays the fanout error code.
 */
export class HTTPStatusError extends FanoutError {
  constructor(
    public readonly status: number,
    public readonly url: string
  ) {
    super('HTTP_STATUS', `Request to ${url} failed with status ${status}`)
    this.name = 'HTTPStatusError'
  }
}

/**
 * Retries exhausted for a children-list or detail fetch.
 * `cause` carries the last underlying error.
 */
export class FetchFailedError extends FanoutError {
  constructor(
    public readonly target: string,
    public readonly attempts: number,
    cause: unknown
  ) {
    super('FETCH_FAILED', `Failed to fetch ${target} after ${attempts} attempt(s): ${toError(cause).message}`, { cause })
    this.name = 'FetchFailedError'
  }
}

export function isFanoutError(error: unknown): error is FanoutError {
  return error instanceof FanoutError
}

/**
 * Converts unknown thrown values into an Error
 */
export function toError(error: unknown): Error {
  if (error instanceof Error) {
    return error
  }
  return new Error(String(error))
}
