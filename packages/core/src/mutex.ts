/**
 * Async mutual-exclusion lock
 *
 * Waiters are granted the lock in arrival order. The holder keeps it across
 * awaits until the returned release function is called.
 */

export type Release = () => void

export class Mutex {
  private held = false
  private readonly waiters: Array<() => void> = []

  get isLocked(): boolean {
    return this.held
  }

  /** Number of callers currently waiting for the lock */
  get pending(): number {
    return this.waiters.length
  }

  acquire(): Promise<Release> {
    return new Promise((resolve) => {
      const grant = () => {
        this.held = true
        resolve(this.createRelease())
      }
      if (this.held) {
        this.waiters.push(grant)
      } else {
        grant()
      }
    })
  }

  /**
   * Hold the lock for the whole of `fn`, including any awaits inside it
   */
  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquire()
    try {
      return await fn()
    } finally {
      release()
    }
  }

  private createRelease(): Release {
    let released = false
    return () => {
      if (released) return
      released = true
      const next = this.waiters.shift()
      if (next) {
        // ownership passes straight to the next waiter
        next()
      } else {
        this.held = false
      }
    }
  }
}
