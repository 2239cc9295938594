/**
 * Promise-chained exclusive lock. Callers run strictly one after another in the
 * order they asked; a rejected section releases the lock like a resolved one.
 */
export class Mutex {
  private queue: Promise<void> = Promise.resolve();

  public runExclusive<T>(section: () => Promise<T> | T): Promise<T> {
    const result = this.queue.then(section);
    this.queue = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}
