interface LockState {
  tail: Promise<void>;
  pending: number;
}

/**
 * Promise-chained mutex per key. Callers on the same key run one at a time in
 * arrival order; different keys never wait on each other.
 */
export class KeyedMutex {
  private readonly locks = new Map<string, LockState>();

  async runExclusive<TOutput>(key: string, operation: () => Promise<TOutput>): Promise<TOutput> {
    const lockState = this.locks.get(key) ?? { tail: Promise.resolve(), pending: 0 };
    this.locks.set(key, lockState);
    lockState.pending += 1;

    const acquire = lockState.tail;
    let releaseTail: () => void = () => {};
    const releaseSignal = new Promise<void>((resolve) => {
      releaseTail = resolve;
    });
    lockState.tail = lockState.tail.then(() => releaseSignal);

    await acquire;
    try {
      return await operation();
    } finally {
      releaseTail();
      lockState.pending -= 1;
      if (lockState.pending === 0) {
        this.locks.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.locks.has(key);
  }

  get size(): number {
    return this.locks.size;
  }
}
