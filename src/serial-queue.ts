/**
 * Single-consumer task queue.
 *
 * Tasks run one at a time in submission order. A task that rejects does
 * not stall the queue; its rejection is delivered to the caller that
 * submitted it.
 */

export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  run<T>(task: () => Promise<T> | T): Promise<T> {
    this.pending++;
    const result = this.tail.then(task).finally(() => {
      this.pending--;
    });
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  /** Tasks submitted but not yet settled */
  get size(): number {
    return this.pending;
  }

  /** Resolves once every task submitted so far has settled */
  idle(): Promise<void> {
    return this.tail;
  }
}
