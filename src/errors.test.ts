import { describe, it, expect } from 'vitest'
import {
  FanoutError,
  FetchFailedError,
  HTTPStatusError,
  isFanoutError,
  LockTimeoutError,
  NetworkError,
  toError,
  UsageError,
} from './errors'

describe('Errors', () => {
  it('should carry a stable code and name on each error', () => {
    const errors: Array<[FanoutError, string, string]> = [
      [new UsageError('Usage: fanout <rootId>'), 'USAGE', 'UsageError'],
      [new LockTimeoutError('3', 100), 'LOCK_TIMEOUT', 'LockTimeoutError'],
      [new NetworkError('down', 'http://x'), 'NETWORK', 'NetworkError'],
      [new HTTPStatusError(502, 'http://x'), 'HTTP_STATUS', 'HTTPStatusError'],
      [new FetchFailedError('c1', 4, new Error('down')), 'FETCH_FAILED', 'FetchFailedError'],
    ]

    for (const [error, code, name] of errors) {
      expect(error.code).toBe(code)
      expect(error.name).toBe(name)
      expect(isFanoutError(error)).toBe(true)
    }
  })

  it('should describe the lock and the timeout', () => {
    expect(new LockTimeoutError('3', 250).message).toBe('Timed out after 250ms waiting for lock "3"')
  })

  it('should expose the HTTP status apart from the error code', () => {
    const error = new HTTPStatusError(404, 'http://x/films/99/')

    expect(error.status).toBe(404)
    expect(error.code).toBe('HTTP_STATUS')
    expect(error.url).toBe('http://x/films/99/')
  })

  it('should keep the last underlying error as cause', () => {
    const last = new HTTPStatusError(500, 'http://x/people/2/')
    const failure = new FetchFailedError('http://x/people/2/', 4, last)

    expect(failure.cause).toBe(last)
    expect(failure.message).toBe(
      'Failed to fetch http://x/people/2/ after 4 attempt(s): Request to http://x/people/2/ failed with status 500'
    )
  })

  it('should normalize thrown values', () => {
    const error = new Error('kept')

    expect(toError(error)).toBe(error)
    expect(toError('text').message).toBe('text')
    expect(isFanoutError(error)).toBe(false)
  })
})
