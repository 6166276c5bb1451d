import type { Lock, LockManager } from './lock-manager'
import { LockTimeoutError } from '../errors'
import { MAX_TIMEOUT_MS } from '../types'
import { logger as defaultLogger, type Logger } from '../observability'

interface Waiter {
  grant: (lock: Lock) => void
  timer: NodeJS.Timeout
}

interface LockEntry {
  key: string
  held: boolean
  waiters: Waiter[]
}

/**
 * InMemoryLockManager - process-local locks with a FIFO waiter queue per key.
 *
 * Release hands the lock straight to the oldest waiter, so the entry never
 * passes through an unheld state while someone is queued.
 */
export class InMemoryLockManager implements LockManager {
  private locks = new Map<string, LockEntry>()
  private logger: Logger

  constructor(options: { logger?: Logger } = {}) {
    this.logger = options.logger ?? defaultLogger
  }

  /**
   * Timeouts above MAX_TIMEOUT_MS are clamped to it.
   */
  acquire(key: string, timeoutMs: number): Promise<Lock> {
    const existing = this.locks.get(key)

    if (!existing) {
      this.locks.set(key, { key, held: true, waiters: [] })
      return Promise.resolve({ key, acquiredAt: Date.now() })
    }

    return new Promise<Lock>((resolve, reject) => {
      const waiter: Waiter = {
        grant: resolve,
        timer: setTimeout(() => {
          const index = existing.waiters.indexOf(waiter)
          if (index !== -1) {
            existing.waiters.splice(index, 1)
          }
          this.logger.debug({ key, timeoutMs }, 'Lock wait timed out')
          reject(new LockTimeoutError(key, timeoutMs))
        }, Math.min(timeoutMs, MAX_TIMEOUT_MS)),
      }
      existing.waiters.push(waiter)
      this.logger.debug({ key, position: existing.waiters.length }, 'Waiting for lock')
    })
  }

  release(key: string): boolean {
    const entry = this.locks.get(key)

    if (!entry?.held) {
      this.logger.warn({ key }, 'Release called for a lock that is not held')
      return false
    }

    const next = entry.waiters.shift()
    if (next) {
      clearTimeout(next.timer)
      next.grant({ key, acquiredAt: Date.now() })
    } else {
      this.locks.delete(key)
    }
    return true
  }

  async withLock<T>(key: string, timeoutMs: number, fn: () => Promise<T>): Promise<T> {
    await this.acquire(key, timeoutMs)
    try {
      return await fn()
    } finally {
      this.release(key)
    }
  }

  isHeld(key: string): boolean {
    return this.locks.get(key)?.held ?? false
  }

  /**
   * Number of callers queued behind the current holder
   */
  waiting(key: string): number {
    return this.locks.get(key)?.waiters.length ?? 0
  }
}
