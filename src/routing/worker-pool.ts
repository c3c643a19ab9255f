export type ReleaseSlot = () => void;

/**
 * Promise pool: at most `concurrency` slots are held at once, the rest wait in
 * FIFO order. A holder may give its slot back while it waits on something
 * outside the engine and queue again afterwards.
 */
export class WorkerPool {
  private running = 0;
  private readonly queue: Array<() => void> = [];

  constructor(private readonly concurrency: number) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new Error(`Worker pool concurrency must be >= 1, got ${concurrency}`);
    }
  }

  /**
   * Resolves with the slot's release function. Aborting `signal` while still
   * queued leaves the queue and rejects with the signal's reason.
   */
  acquire(signal?: AbortSignal): Promise<ReleaseSlot> {
    return new Promise<ReleaseSlot>((resolve, reject) => {
      if (signal?.aborted) {
        reject(signal.reason);
        return;
      }

      const grant = (): void => {
        signal?.removeEventListener("abort", onAbort);
        this.running += 1;
        let released = false;
        resolve(() => {
          if (released) {
            return;
          }
          released = true;
          this.running -= 1;
          this.queue.shift()?.();
        });
      };
      const onAbort = (): void => {
        const index = this.queue.indexOf(grant);
        if (index >= 0) {
          this.queue.splice(index, 1);
          reject(signal?.reason);
        }
      };

      if (this.running < this.concurrency) {
        grant();
      } else {
        this.queue.push(grant);
        signal?.addEventListener("abort", onAbort, { once: true });
      }
    });
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await task();
    } finally {
      release();
    }
  }

  stats(): { running: number; queued: number; concurrency: number } {
    return {
      running: this.running,
      queued: this.queue.length,
      concurrency: this.concurrency,
    };
  }
}
