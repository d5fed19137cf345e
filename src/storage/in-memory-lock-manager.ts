import { v4 as uuidv4 } from 'uuid'
import type { Lock, LockManager } from './lock-manager'

interface KeyState {
  holder: Lock
  waiters: Array<(lock: Lock) => void>
}

/**
 * InMemoryLockManager - single-process keyed mutex.
 * Waiters on a key are granted the lock in arrival order.
 */
export class InMemoryLockManager implements LockManager {
  private keys = new Map<string, KeyState>()

  async acquire(key: string): Promise<Lock> {
    const state = this.keys.get(key)

    if (!state) {
      const lock = this.createLock(key)
      this.keys.set(key, { holder: lock, waiters: [] })
      return lock
    }

    return new Promise<Lock>((resolve) => {
      state.waiters.push(resolve)
    })
  }

  async release(lock: Lock): Promise<void> {
    const state = this.keys.get(lock.key)

    // Only release if token matches
    if (!state || state.holder.token !== lock.token) {
      return
    }

    const next = state.waiters.shift()
    if (!next) {
      this.keys.delete(lock.key)
      return
    }

    state.holder = this.createLock(lock.key)
    next(state.holder)
  }

  isLocked(key: string): boolean {
    return this.keys.has(key)
  }

  private createLock(key: string): Lock {
    return {
      key,
      token: uuidv4(),
      acquiredAt: Date.now(),
    }
  }
}
