import { LockTimeoutError } from '@testmend/shared';

export type Release = () => void;

/**
 * Exclusive async lock per key, granted in FIFO order.
 * A waiter that times out leaves the queue without holding up the ones behind it.
 */
export class KeyedLock {
  private readonly held = new Set<string>();
  private readonly queues = new Map<string, Array<() => void>>();

  acquire(key: string, timeoutMs: number): Promise<Release> {
    if (!this.held.has(key)) {
      this.held.add(key);
      return Promise.resolve(this.releaser(key));
    }

    return new Promise<Release>((resolve, reject) => {
      const queue = this.queues.get(key) ?? [];
      this.queues.set(key, queue);

      const grant = () => {
        clearTimeout(timer);
        resolve(this.releaser(key));
      };
      const timer = setTimeout(() => {
        const idx = queue.indexOf(grant);
        if (idx !== -1) queue.splice(idx, 1);
        if (queue.length === 0 && this.queues.get(key) === queue) this.queues.delete(key);
        reject(new LockTimeoutError(key, timeoutMs));
      }, timeoutMs);

      queue.push(grant);
    });
  }

  async withLock<T>(key: string, timeoutMs: number, fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire(key, timeoutMs);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  isLocked(key: string): boolean {
    return this.held.has(key);
  }

  /** Waiters queued behind the current holder of `key`. */
  waiting(key: string): number {
    return this.queues.get(key)?.length ?? 0;
  }

  private releaser(key: string): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      const queue = this.queues.get(key);
      const next = queue?.shift();
      if (queue && queue.length === 0) this.queues.delete(key);
      if (next) {
        next();
      } else {
        this.held.delete(key);
      }
    };
  }
}
