/**
 * Promise-chained mutual exclusion. Tasks passed to runExclusive run one at a
 * time, in call order; a rejected task does not block the ones behind it.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  get isLocked(): boolean {
    return this.pending > 0;
  }

  runExclusive<T>(task: () => Promise<T> | T): Promise<T> {
    this.pending += 1;
    const run = this.tail.then(task);
    this.tail = run.then(
      () => this.release(),
      () => this.release()
    );
    return run;
  }

  private release(): void {
    this.pending -= 1;
  }
}
