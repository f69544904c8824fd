import { SettlementError } from './errors'

/**
 * Mutual exclusion around the settlement entry point. The lock is held across
 * every external call of a run and released on every exit path.
 */
export class ReentrancyGuard {
  private locked = false

  isLocked(): boolean {
    return this.locked
  }

  async run<T>(fn: () => Promise<T>): Promise<T> {
    if (this.locked) throw new SettlementError('ReentrantCall', 'Reentrant call to the settlement entry point')
    this.locked = true
    try {
      return await fn()
    } finally {
      this.locked = false
    }
  }
}
