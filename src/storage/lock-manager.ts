/**
 * Lock - Exclusive hold on a key
 */
export interface Lock {
  key: string
  acquiredAt: number
}

/**
 * LockManager - Single-holder locking keyed by arbitrary identifiers
 */
export interface LockManager {
  /**
   * Wait until no other caller holds `key`, then take it.
   * Rejects with LockTimeoutError if the lock isn't granted within `timeoutMs`.
   */
  acquire(key: string, timeoutMs: number): Promise<Lock>

  /**
   * Release a lock. Returns false (and reports it) if the key wasn't held.
   */
  release(key: string): boolean

  /**
   * Scoped acquisition: the lock is released however `fn` settles
   */
  withLock<T>(key: string, timeoutMs: number, fn: () => Promise<T>): Promise<T>
}
