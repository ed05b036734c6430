/**
 * Promise-chained mutual exclusion. Callers run strictly in the order they
 * asked for the lock; a failing section releases it for the next one.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  runExclusive<T>(section: () => T | Promise<T>): Promise<T> {
    const result = this.tail.then(section);
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
