/**
 * Serializes async critical sections by chaining them on a single promise.
 * A rejected section does not poison the chain.
 */
export class SerialLock {
  private tail: Promise<void> = Promise.resolve();

  run<T>(section: () => T | Promise<T>): Promise<T> {
    const result = this.tail.then(section);
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
