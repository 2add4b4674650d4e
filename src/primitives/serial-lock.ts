/**
 * @module primitives/serial-lock
 * @description Single-writer lock built on a promise chain.
 */

/**
 * Runs tasks strictly one after another, in call order.
 *
 * @example
 * ```ts
 * const lock = new SerialLock();
 * await Promise.all([lock.run(writeA), lock.run(writeB)]); // A completes before B starts
 * ```
 */
export class SerialLock {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  run<T>(task: () => Promise<T>): Promise<T> {
    this.pending++;
    const result = this.tail.then(task);
    // The caller observes failures through `result`; the chain only needs to settle.
    this.tail = result.then(
      () => {
        this.pending--;
      },
      () => {
        this.pending--;
      }
    );
    return result;
  }

  /** Tasks queued or running. */
  get size(): number {
    return this.pending;
  }
}
