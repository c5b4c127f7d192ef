/**
 * TaskQueue: Bounded FIFO worker pool.
 *
 * Runs at most `concurrency` jobs at once; further jobs wait in arrival
 * order. A job that rejects is reported to `onError` and does not stop
 * the queue.
 */

import { TaskError } from "./task-registry.js";

export type Job = () => Promise<void>;

export interface TaskQueueOptions {
  /** Maximum jobs running at once. Default: 4 */
  readonly concurrency?: number | undefined;
  /** Receives the rejection of any job */
  readonly onError: (error: unknown) => void;
}

export class TaskQueue {
  private readonly concurrency: number;
  private readonly onError: (error: unknown) => void;
  private readonly waiting: Job[] = [];
  private readonly idleWaiters: Array<() => void> = [];
  private running = 0;
  private accepting = true;

  constructor(options: TaskQueueOptions) {
    const concurrency = options.concurrency ?? 4;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`);
    }
    this.concurrency = concurrency;
    this.onError = options.onError;
  }

  /**
   * Queue a job. Throws QUEUE_STOPPED after stop().
   */
  add(job: Job): void {
    if (!this.accepting) {
      throw new TaskError("QUEUE_STOPPED", "Task queue is stopped");
    }
    this.waiting.push(job);
    this.drain();
  }

  /**
   * Resolves once no job is running or waiting.
   */
  onIdle(): Promise<void> {
    if (this.isIdle) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /**
   * Stop accepting jobs and wait for the queued ones to finish.
   */
  async stop(): Promise<void> {
    this.accepting = false;
    await this.onIdle();
  }

  get isAccepting(): boolean {
    return this.accepting;
  }

  get pending(): number {
    return this.waiting.length;
  }

  get active(): number {
    return this.running;
  }

  get isIdle(): boolean {
    return this.running === 0 && this.waiting.length === 0;
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private drain(): void {
    while (this.running < this.concurrency) {
      const job = this.waiting.shift();
      if (job === undefined) {
        break;
      }
      this.running++;
      // Start on a later microtask so add() never runs job code inline.
      void Promise.resolve()
        .then(job)
        .catch(this.onError)
        .finally(() => {
          this.running--;
          this.drain();
          this.notifyIfIdle();
        });
    }
  }

  private notifyIfIdle(): void {
    if (!this.isIdle) {
      return;
    }
    for (const resolve of this.idleWaiters.splice(0)) {
      resolve();
    }
  }
}
