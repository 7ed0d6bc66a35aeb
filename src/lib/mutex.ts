/**
 * Promise-chained mutual exclusion. Tasks run one at a time in call order;
 * a rejected task releases the lock like a resolved one.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
