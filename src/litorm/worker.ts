// worker.ts

/**
 * FIFO job runner. Jobs run one at a time in submission order, each on a
 * later turn of the event loop than the call that submitted it.
 */
export class SerialWorker {
  private queue: Array<() => Promise<void>> = [];
  private busy = false;

  submit<R>(job: () => R | Promise<R>): Promise<R> {
    return new Promise<R>((resolve, reject) => {
      this.queue.push(async () => {
        try {
          resolve(await job());
        } catch (err) {
          reject(err);
        }
      });
      void this.drain();
    });
  }

  get pending(): number {
    return this.queue.length + (this.busy ? 1 : 0);
  }

  private async drain(): Promise<void> {
    if (this.busy) return;
    this.busy = true;

    try {
      for (let next = this.queue.shift(); next; next = this.queue.shift()) {
        await new Promise<void>((resolve) => setImmediate(resolve));
        await next();
      }
    } finally {
      this.busy = false;
    }
  }
}
