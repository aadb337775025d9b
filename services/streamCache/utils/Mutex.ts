/**
 * Serializes async critical sections in call order.
 * A rejected task does not poison the queue; its error goes to its own caller.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  public runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
