import { toAppError } from "./error-handling";

export interface InferenceQueueOptions {
  concurrency: number;
  /** Jobs allowed to wait; enqueue refuses beyond this */
  capacity: number;
}

export interface QueueStats {
  pending: number;
  active: number;
  processed: number;
  failed: number;
  rejected: number;
  closed: boolean;
}

/**
 * Bounded FIFO of background jobs with a fixed number of concurrent
 * workers. A handler error is logged and counted; it never stops the queue.
 */
export class InferenceQueue<T> {
  private readonly pending: T[] = [];
  private active = 0;
  private processed = 0;
  private failed = 0;
  private rejected = 0;
  private closed = false;
  private idleWaiters: Array<() => void> = [];

  constructor(
    private readonly handler: (job: T) => Promise<unknown>,
    private readonly options: InferenceQueueOptions
  ) {}

  /** False when the queue is closed or already holds `capacity` waiting jobs. */
  enqueue(job: T): boolean {
    if (this.closed || this.pending.length >= this.options.capacity) {
      this.rejected++;
      return false;
    }
    this.pending.push(job);
    this.pump();
    return true;
  }

  /** Resolves once nothing is waiting or running. */
  drain(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  /** Stops accepting work and waits for what is already queued. */
  async close(): Promise<void> {
    this.closed = true;
    await this.drain();
  }

  stats(): QueueStats {
    return {
      pending: this.pending.length,
      active: this.active,
      processed: this.processed,
      failed: this.failed,
      rejected: this.rejected,
      closed: this.closed,
    };
  }

  private isIdle(): boolean {
    return this.pending.length === 0 && this.active === 0;
  }

  private pump(): void {
    while (this.active < this.options.concurrency && this.pending.length > 0) {
      const job = this.pending.shift();
      if (job === undefined) break;
      this.active++;
      void this.run(job);
    }
  }

  private async run(job: T): Promise<void> {
    try {
      await this.handler(job);
      this.processed++;
    } catch (error) {
      this.failed++;
      console.error(`[Queue] Job failed: ${toAppError(error).describe()}`);
    } finally {
      this.active--;
      this.pump();
      if (this.isIdle()) {
        const waiters = this.idleWaiters;
        this.idleWaiters = [];
        waiters.forEach((resolve) => resolve());
      }
    }
  }
}
