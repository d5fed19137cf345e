/**
 * Lock - handle for an exclusively held key
 */
export interface Lock {
  key: string
  token: string
  acquiredAt: number
}

/**
 * LockManager - mutual exclusion per key
 */
export interface LockManager {
  /**
   * Acquire a lock, waiting until the current holder releases it
   */
  acquire(key: string): Promise<Lock>

  /**
   * Release a lock (no-op if the token no longer holds the key)
   */
  release(lock: Lock): Promise<void>
}

/**
 * Run `fn` while holding `key`; the lock is released even when `fn` throws
 */
export async function withLock<T>(
  manager: LockManager,
  key: string,
  fn: () => T | Promise<T>
): Promise<T> {
  const lock = await manager.acquire(key)
  try {
    return await fn()
  } finally {
    await manager.release(lock)
  }
}
