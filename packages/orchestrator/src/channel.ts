/**
 * FIFO hand-off from background operations to the poll loop
 */
export class CompletionChannel<T> {
  private queue: T[] = [];

  post(message: T): void {
    this.queue.push(message);
  }

  /** Next pending message, if any; never waits */
  take(): T | undefined {
    return this.queue.shift();
  }

  get size(): number {
    return this.queue.length;
  }
}
