/**
 * AsyncMutex
 *
 * FIFO mutual exclusion for async critical sections. The nonce sequencer
 * holds it across read-check-allocate, the liquidation trigger across a sale.
 * Sections are chained on one promise, so a section that throws releases the
 * lock for the next one.
 *
 * @example
 * ```ts
 * const nonces = await mutex.runExclusive(() => this.allocate(count));
 * ```
 */

export class AsyncMutex {
  private tail: Promise<void> = Promise.resolve();
  private queued = 0;
  private held = false;

  runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    this.queued += 1;
    const section = this.tail.then(() => {
      this.queued -= 1;
      this.held = true;
      return fn();
    });

    const release = (): void => {
      this.held = false;
    };
    this.tail = section.then(release, release);
    return section;
  }

  isLocked(): boolean {
    return this.held;
  }

  /** Sections waiting for the lock */
  get waiting(): number {
    return this.queued;
  }
}
