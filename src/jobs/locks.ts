/**
 * In-process mutual exclusion
 *
 * Both locks queue callers in arrival order. A failing critical section
 * releases the lock and rejects only its own caller.
 */

export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  /**
   * Run `task` once every earlier task has settled
   */
  runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}

/**
 * One mutex per key, dropped again when nobody is waiting on it
 */
export class KeyedMutex {
  private readonly locks = new Map<string, { mutex: Mutex; pending: number }>();

  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    let lock = this.locks.get(key);
    if (!lock) {
      lock = { mutex: new Mutex(), pending: 0 };
      this.locks.set(key, lock);
    }
    lock.pending++;

    try {
      return await lock.mutex.runExclusive(task);
    } finally {
      lock.pending--;
      if (lock.pending === 0) {
        this.locks.delete(key);
      }
    }
  }

  /** Keys with a running or queued task */
  get size(): number {
    return this.locks.size;
  }
}
