/**
 * Serial task queue
 * Runs submitted async tasks one at a time, in submission order
 */

export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /**
   * Queue a task; resolves or rejects with the task's own outcome.
   * A failed task does not block the tasks queued behind it.
   */
  run<T>(task: () => Promise<T>): Promise<T> {
    this.pending++;
    const result = this.tail.then(task);
    this.tail = result.then(
      () => this.settle(),
      () => this.settle()
    );
    return result;
  }

  get size(): number {
    return this.pending;
  }

  /**
   * Resolves once every task queued so far has settled
   */
  idle(): Promise<void> {
    return this.tail;
  }

  private settle(): void {
    this.pending--;
  }
}
