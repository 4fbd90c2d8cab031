/**
 * In-process readers/writer locks.
 *
 * Readers share, writers are exclusive, and waiters are granted strictly in
 * arrival order, so a queued writer is never starved by later readers.
 */

type LockMode = 'read' | 'write'

type Waiter = {
  mode: LockMode
  grant: () => void
}

export type Release = () => void

export class RwLock {
  private readers = 0
  private writer = false
  private readonly queue: Waiter[] = []

  acquireRead(): Promise<Release> {
    return this.acquire('read')
  }

  acquireWrite(): Promise<Release> {
    return this.acquire('write')
  }

  /** Nobody holds or waits for the lock. */
  get idle(): boolean {
    return this.readers === 0 && !this.writer && this.queue.length === 0
  }

  private acquire(mode: LockMode): Promise<Release> {
    return new Promise((resolve) => {
      this.queue.push({ mode, grant: () => resolve(this.releaser(mode)) })
      this.drain()
    })
  }

  private drain(): void {
    for (let next = this.queue[0]; next; next = this.queue[0]) {
      if (next.mode === 'write') {
        if (this.writer || this.readers > 0) return
        this.writer = true
      } else {
        if (this.writer) return
        this.readers++
      }
      this.queue.shift()
      next.grant()
    }
  }

  private releaser(mode: LockMode): Release {
    let released = false
    return () => {
      if (released) return
      released = true
      if (mode === 'write') {
        this.writer = false
      } else {
        this.readers--
      }
      this.drain()
    }
  }
}

/**
 * One {@link RwLock} per key, created on demand and dropped once idle.
 */
export class KeyedRwLock {
  private readonly locks = new Map<string, RwLock>()

  withRead<T>(key: string, fn: () => Promise<T>): Promise<T> {
    return this.with(key, 'read', fn)
  }

  withWrite<T>(key: string, fn: () => Promise<T>): Promise<T> {
    return this.with(key, 'write', fn)
  }

  /** Number of keys with a live lock. */
  get size(): number {
    return this.locks.size
  }

  private async with<T>(key: string, mode: LockMode, fn: () => Promise<T>): Promise<T> {
    let lock = this.locks.get(key)
    if (!lock) {
      lock = new RwLock()
      this.locks.set(key, lock)
    }

    const release = mode === 'read' ? await lock.acquireRead() : await lock.acquireWrite()
    try {
      return await fn()
    } finally {
      release()
      if (lock.idle && this.locks.get(key) === lock) {
        this.locks.delete(key)
      }
    }
  }
}
