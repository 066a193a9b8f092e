/**
 * Exclusive lock over async tasks: each task starts only after the previous
 * one has settled, in call order.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private waiting = 0;

  /** Tasks queued or running. */
  get pending(): number {
    return this.waiting;
  }

  runExclusive<T>(task: () => T | Promise<T>): Promise<T> {
    this.waiting++;
    const run = this.tail.then(task).finally(() => {
      this.waiting--;
    });
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
