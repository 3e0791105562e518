/**
 * In-process reader/writer lock.
 *
 * Readers share the lock, writers hold it alone. Waiters are served in
 * arrival order: a reader that arrives behind a waiting writer waits for that
 * writer, so a steady stream of readers cannot starve writes.
 */

type Mode = 'read' | 'write'

interface Waiter {
  mode: Mode
  grant: () => void
}

export class ReadWriteLock {
  private readers = 0
  private writing = false
  private readonly queue: Waiter[] = []

  /** Run `fn` holding the lock shared */
  async withReadLock<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire('read')
    try {
      return await fn()
    } finally {
      this.release('read')
    }
  }

  /** Run `fn` holding the lock exclusively */
  async withWriteLock<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire('write')
    try {
      return await fn()
    } finally {
      this.release('write')
    }
  }

  private canGrant(mode: Mode): boolean {
    return mode === 'read' ? !this.writing : !this.writing && this.readers === 0
  }

  private take(mode: Mode): void {
    if (mode === 'read') {
      this.readers++
    } else {
      this.writing = true
    }
  }

  private acquire(mode: Mode): Promise<void> {
    if (this.queue.length === 0 && this.canGrant(mode)) {
      this.take(mode)
      return Promise.resolve()
    }
    return new Promise((resolve) => {
      this.queue.push({ mode, grant: resolve })
    })
  }

  private release(mode: Mode): void {
    if (mode === 'read') {
      this.readers--
    } else {
      this.writing = false
    }
    this.drain()
  }

  private drain(): void {
    let next = this.queue[0]
    while (next !== undefined && this.canGrant(next.mode)) {
      this.queue.shift()
      this.take(next.mode)
      next.grant()
      next = this.queue[0]
    }
  }
}
