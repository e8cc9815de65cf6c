import os from 'node:os';
import { AppError } from '../errors';

/**
 * Thrown into tasks that were still queued when the pool was cancelled.
 */
export class PoolCancelledError extends AppError {
  constructor() {
    super('UnknownError', 'Worker pool was cancelled before the task started');
  }
}

interface QueuedTask {
  start: (slot: number) => void;
  cancel: () => void;
}

export function defaultConcurrency(): number {
  return Math.max(1, os.availableParallelism());
}

/**
 * Fixed number of async execution slots. At most `size` submitted tasks run at once;
 * the rest wait in FIFO order. Tasks must not await other tasks of the same pool while
 * holding a slot, or a full pool deadlocks.
 */
export class WorkerPool {
  readonly size: number;
  private readonly queue: QueuedTask[] = [];
  private readonly freeSlots: number[];
  private cancelled = false;
  constructor(size: number = defaultConcurrency(), signal?: AbortSignal) {
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError(`Worker pool size must be a positive integer, got ${size}`);
    }
    this.size = size;
    // Slot ids are handed out lowest-first so logs read worker=0..size-1.
    this.freeSlots = Array.from({ length: size }, (_, i) => size - 1 - i);

    if (signal) {
      if (signal.aborted) {
        this.cancel();
      } else {
        signal.addEventListener('abort', () => this.cancel(), { once: true });
      }
    }
  }

  get activeCount(): number {
    return this.size - this.freeSlots.length;
  }

  get isCancelled(): boolean {
    return this.cancelled;
  }

  /**
   * Queues `task`; it receives the id of the slot it runs in.
   */
  submit<R>(task: (slot: number) => Promise<R>): Promise<R> {
    if (this.cancelled) {
      return Promise.reject(new PoolCancelledError());
    }
    return new Promise<R>((resolve, reject) => {
      this.queue.push({
        start: (slot) => {
          void Promise.resolve()
            .then(() => task(slot))
            .then(resolve, reject)
            .finally(() => this.release(slot));
        },
        cancel: () => reject(new PoolCancelledError()),
      });
      this.drain();
    });
  }

  /**
   * Runs `fn` over every item; results keep the input order.
   */
  map<T, R>(items: readonly T[], fn: (item: T, slot: number) => Promise<R>): Promise<R[]> {
    return Promise.all(items.map((item) => this.submit((slot) => fn(item, slot))));
  }

  /**
   * Stops handing out slots. Queued tasks reject with {@link PoolCancelledError};
   * running tasks are left to finish (or to honour their own abort signal).
   */
  cancel(): void {
    if (this.cancelled) return;
    this.cancelled = true;
    const dropped = this.queue.splice(0, this.queue.length);
    for (const task of dropped) {
      task.cancel();
    }
  }

  private drain(): void {
    while (!this.cancelled && this.queue.length > 0 && this.freeSlots.length > 0) {
      const next = this.queue.shift();
      const slot = this.freeSlots.pop();
      if (next === undefined || slot === undefined) break;
      next.start(slot);
    }
  }

  private release(slot: number): void {
    this.freeSlots.push(slot);
    this.freeSlots.sort((a, b) => b - a);
    this.drain();
  }
}
