/**
 * FIFO mutual exclusion for async callers.
 *
 * Tasks run one at a time in the order runExclusive was called. A task
 * that throws rejects its own promise and releases the lock for the next
 * one in line.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  runExclusive<T>(task: () => T): Promise<T> {
    const result = this.tail.then(task);
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
