import { reject } from '@feegate/reasons'

/**
 * ReentrancyGuard
 * Single in-progress flag. A second run() while one is active fails ACCESS_REENTRANT_CALL;
 * the flag is cleared on every exit path of the outer run().
 */
export class ReentrancyGuard {
  private entered = false

  get locked(): boolean {
    return this.entered
  }

  run<T>(work: () => T): T {
    if (this.entered) reject('ACCESS_REENTRANT_CALL')
    this.entered = true
    try {
      return work()
    } finally {
      this.entered = false
    }
  }
}
