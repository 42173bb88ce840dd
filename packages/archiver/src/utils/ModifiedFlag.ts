/**
 * A resettable signal. `wait` resolves once the flag is set, or right away if
 * it already is, or when `signal` aborts.
 */
export class ModifiedFlag {
  private flagged = false;
  private waiters = new Set<() => void>();

  get isSet(): boolean {
    return this.flagged;
  }

  set(): void {
    this.flagged = true;
    for (const waiter of [...this.waiters]) {
      waiter();
    }
  }

  clear(): void {
    this.flagged = false;
  }

  wait(signal?: AbortSignal): Promise<void> {
    if (this.flagged || signal?.aborted) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      const done = () => {
        this.waiters.delete(done);
        signal?.removeEventListener('abort', done);
        resolve();
      };
      this.waiters.add(done);
      signal?.addEventListener('abort', done, { once: true });
    });
  }
}
