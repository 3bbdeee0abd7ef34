/**
 * Read/Write Lock
 *
 * Shared/exclusive lock over the whole graph. Readers overlap each other,
 * a writer runs alone. Waiters are served in arrival order, so a queued
 * writer is never starved by a stream of readers.
 */

type LockMode = "read" | "write"

interface Waiter {
  mode: LockMode
  grant: () => void
}

export class ReadWriteLock {
  private activeReaders = 0
  private writerActive = false
  private readonly queue: Waiter[] = []

  /**
   * Run `task` holding the shared side of the lock.
   */
  async read<T>(task: () => T | Promise<T>): Promise<T> {
    await this.acquire("read")
    try {
      return await task()
    } finally {
      this.release("read")
    }
  }

  /**
   * Run `task` holding the exclusive side of the lock.
   */
  async write<T>(task: () => T | Promise<T>): Promise<T> {
    await this.acquire("write")
    try {
      return await task()
    } finally {
      this.release("write")
    }
  }

  /** Number of callers waiting for the lock */
  get pending(): number {
    return this.queue.length
  }

  private canGrant(mode: LockMode): boolean {
    if (this.writerActive) return false
    return mode === "read" || this.activeReaders === 0
  }

  private take(mode: LockMode): void {
    if (mode === "read") {
      this.activeReaders++
    } else {
      this.writerActive = true
    }
  }

  private acquire(mode: LockMode): Promise<void> {
    if (this.queue.length === 0 && this.canGrant(mode)) {
      this.take(mode)
      return Promise.resolve()
    }
    return new Promise<void>((resolve) => {
      this.queue.push({ mode, grant: resolve })
    })
  }

  private release(mode: LockMode): void {
    if (mode === "read") {
      this.activeReaders--
    } else {
      this.writerActive = false
    }

    while (this.queue.length > 0) {
      const next = this.queue[0]
      if (!next || !this.canGrant(next.mode)) break
      this.queue.shift()
      this.take(next.mode)
      next.grant()
    }
  }
}
