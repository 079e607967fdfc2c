/**
 * Per-document write serialisation.
 *
 * Each key has at most one holder; other callers queue in arrival order and
 * are handed the lock as it is released. Keys never block one another.
 *
 * @example
 * ```typescript
 * const locks = new DocumentLockManager()
 * await locks.run('doc-1', async () => {
 *   const history = await storage.load('doc-1')
 *   await storage.store('doc-1', [...history, next])
 * })
 * ```
 */

export interface LockHandle {
  readonly id: string;
  readonly key: string;
  readonly acquiredAt: number;
  release(): void;
}

export class DocumentLockManager {
  private locks = new Map<string, LockHandle>();
  private queues = new Map<string, Array<(handle: LockHandle) => void>>();
  private lockIdCounter = 0;

  acquire(key: string): Promise<LockHandle> {
    if (!this.locks.has(key)) {
      return Promise.resolve(this.createLockHandle(key));
    }

    return new Promise((resolve) => {
      const queue = this.queues.get(key) ?? [];
      queue.push(resolve);
      this.queues.set(key, queue);
    });
  }

  /** Runs `task` while holding the lock for `key`; releases on settle. */
  async run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const handle = await this.acquire(key);
    try {
      return await task();
    } finally {
      handle.release();
    }
  }

  release(handle: LockHandle): void {
    const current = this.locks.get(handle.key);

    // Only the owning handle may release
    if (!current || current.id !== handle.id) {
      return;
    }

    this.locks.delete(handle.key);

    const queue = this.queues.get(handle.key);
    const next = queue?.shift();
    if (queue && queue.length === 0) {
      this.queues.delete(handle.key);
    }
    if (next) {
      next(this.createLockHandle(handle.key));
    }
  }

  isLocked(key: string): boolean {
    return this.locks.has(key);
  }

  getQueueLength(key: string): number {
    return this.queues.get(key)?.length ?? 0;
  }

  private createLockHandle(key: string): LockHandle {
    const handle: LockHandle = {
      id: `lock_${++this.lockIdCounter}`,
      key,
      acquiredAt: Date.now(),
      release: () => this.release(handle),
    };

    this.locks.set(key, handle);
    return handle;
  }
}
