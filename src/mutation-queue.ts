/**
 * MutationQueue - single-writer funnel
 *
 * Every change to the review store and peer registry runs as a task on this
 * queue, one at a time and in submission order. Network tasks and timers
 * never touch that state directly; they submit work here and await the
 * result.
 */

export class MutationQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /**
   * Run a task after every previously submitted task has settled
   *
   * A failing task rejects its own promise only; the queue keeps going.
   */
  run<T>(task: () => T | Promise<T>): Promise<T> {
    this.pending++;
    const result = this.tail.then(task);
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

  /**
   * Resolve once the queue is empty, including tasks submitted while waiting
   */
  async idle(): Promise<void> {
    let current: Promise<void>;
    do {
      current = this.tail;
      await current;
    } while (current !== this.tail);
  }

  get size(): number {
    return this.pending;
  }
}
