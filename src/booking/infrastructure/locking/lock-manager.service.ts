import { Injectable } from '@nestjs/common';

interface Lock {
  promise: Promise<void>;
  resolve: () => void;
}

export interface AcquiredLock {
  release: () => void;
  waitTimeMs: number;
}

export class LockTimeoutError extends Error {
  constructor(readonly key: string) {
    super('Lock timeout');
    this.name = 'LockTimeoutError';
  }
}

@Injectable()
export class LockManagerService {
  private locks = new Map<string, Lock>();

  /**
   * Acquire a lock for the given key.
   * Resolves with a release function and how long the caller waited.
   */
  async acquire(key: string, timeoutMs: number = 5000): Promise<AcquiredLock> {
    const startedAt = Date.now();

    // Wait for the current holder; several waiters may wake at once, so re-check
    let existingLock = this.locks.get(key);
    const waited = existingLock !== undefined;
    while (existingLock) {
      const remainingMs = timeoutMs - (Date.now() - startedAt);
      await this.waitFor(existingLock.promise, remainingMs, key);
      existingLock = this.locks.get(key);
    }

    let resolve: () => void = () => undefined;
    const promise = new Promise<void>((res) => {
      resolve = res;
    });
    const lock: Lock = { promise, resolve };
    this.locks.set(key, lock);

    return {
      waitTimeMs: waited ? Math.max(1, Date.now() - startedAt) : 0,
      release: () => {
        if (this.locks.get(key) === lock) {
          lock.resolve();
          this.locks.delete(key);
        }
      },
    };
  }

  /**
   * Acquire several locks in sorted key order so that two callers
   * never wait on each other in a cycle. All-or-nothing.
   */
  async acquireAll(keys: string[], timeoutMs: number = 5000): Promise<AcquiredLock> {
    const sortedKeys = [...new Set(keys)].sort();
    const acquired: AcquiredLock[] = [];

    try {
      for (const key of sortedKeys) {
        acquired.push(await this.acquire(key, timeoutMs));
      }
    } catch (error) {
      for (const lock of acquired) {
        lock.release();
      }
      throw error;
    }

    return {
      waitTimeMs: Math.max(0, ...acquired.map((lock) => lock.waitTimeMs)),
      release: () => {
        for (const lock of acquired) {
          lock.release();
        }
      },
    };
  }

  /**
   * Clear all locks (useful for testing)
   */
  clear(): void {
    // Resolve all pending locks before clearing
    for (const lock of this.locks.values()) {
      lock.resolve();
    }
    this.locks.clear();
  }

  private async waitFor(
    promise: Promise<void>,
    timeoutMs: number,
    key: string,
  ): Promise<void> {
    if (timeoutMs <= 0) {
      throw new LockTimeoutError(key);
    }

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new LockTimeoutError(key)), timeoutMs);
    });

    try {
      await Promise.race([promise, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
