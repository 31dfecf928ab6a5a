/**
 * Runs async tasks strictly one after another, in submission order.
 *
 * Each task starts only after the previous one settled, so a task's
 * read-compute-write sequence is never interleaved with another's. A
 * rejected task rejects its own promise and does not stall the queue.
 */
export class SerialExecutor {
  private tail: Promise<unknown> = Promise.resolve();
  private pending = 0;

  run<T>(task: () => Promise<T> | T): Promise<T> {
    this.pending++;
    const result = this.tail.then(task).finally(() => {
      this.pending--;
    });
    // The chain only tracks completion; the caller observes the outcome.
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  /** Tasks submitted but not yet settled */
  get size(): number {
    return this.pending;
  }

  /** Resolves once every task submitted so far has settled. */
  idle(): Promise<void> {
    return this.tail.then(() => undefined);
  }
}
