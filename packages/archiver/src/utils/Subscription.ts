import { AsyncQueue } from './AsyncQueue';

/**
 * Async iterator over values delivered to one subscriber. The subscriber is
 * registered as soon as the subscription exists, so nothing published after
 * `subscribe()` returns is missed. Leaving a `for await` loop unsubscribes.
 */
export class Subscription<T> implements AsyncIterableIterator<T> {
  private queue = new AsyncQueue<T>();
  private active = true;

  constructor(
    private subscribers: Set<Subscription<T>>,
    private onClose?: () => void
  ) {
    subscribers.add(this);
  }

  deliver(value: T): void {
    this.queue.push(value);
  }

  next(): Promise<IteratorResult<T>> {
    return this.queue.next();
  }

  async return(): Promise<IteratorResult<T>> {
    this.close();
    return { value: undefined, done: true };
  }

  async throw(error?: unknown): Promise<IteratorResult<T>> {
    this.close();
    throw error;
  }

  close(): void {
    if (!this.active) {
      return;
    }
    this.active = false;
    this.subscribers.delete(this);
    this.queue.close();
    this.onClose?.();
  }

  get pending(): number {
    return this.queue.size;
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<T> {
    return this;
  }
}
