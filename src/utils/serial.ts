/**
 * Runs async tasks one at a time, in submission order
 *
 * Used as the single-writer guard around the done record, the checkpoint
 * file and the audit log.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    // later tasks still run after a failed one; the caller sees the rejection
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
