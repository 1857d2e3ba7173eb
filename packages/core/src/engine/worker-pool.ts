/**
 * Worker Pool
 *
 * Fixed number of execution slots in front of an unbounded FIFO queue.
 * A submitted unit starts as soon as a slot frees; its failure only rejects
 * its own promise. Slots are released when a unit settles, never earlier,
 * so `activeCount` never exceeds `size`.
 */
import { BatchConfigError, PoolClosedError } from "../errors";

export type WorkUnit<T> = () => Promise<T>;

interface QueuedUnit {
  start: () => void;
  abandon: (reason: Error) => void;
}

export interface ClosePoolOptions {
  /** Reject queued units instead of letting them run. Default: false. */
  abandonQueued?: boolean;
}

export class WorkerPool {
  readonly size: number;

  private active = 0;
  private closed = false;
  private readonly queue: QueuedUnit[] = [];
  private idleWaiters: Array<() => void> = [];

  /**
   * @param size - Maximum number of units running at once
   * @throws BatchConfigError if size is not a positive integer
   */
  constructor(size: number) {
    if (!Number.isInteger(size) || size < 1) {
      throw new BatchConfigError(`Invalid worker pool size "${size}". Must be a positive integer.`);
    }
    this.size = size;
  }

  /** Units currently holding a slot. */
  get activeCount(): number {
    return this.active;
  }

  /** Units waiting for a slot. */
  get pendingCount(): number {
    return this.queue.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Queue a unit of work. Resolves or rejects with the unit's own result.
   * Rejects with PoolClosedError if the pool is closed, or if it is closed
   * with `abandonQueued` before the unit got a slot.
   */
  submit<T>(work: WorkUnit<T>): Promise<T> {
    if (this.closed) {
      return Promise.reject(new PoolClosedError());
    }

    return new Promise<T>((resolve, reject) => {
      const start = (): void => {
        this.active++;
        let running: Promise<T>;
        try {
          running = work();
        } catch (err) {
          running = Promise.reject(err);
        }
        void running.then(
          (value) => {
            this.release();
            resolve(value);
          },
          (err: unknown) => {
            this.release();
            reject(err);
          },
        );
      };

      this.queue.push({ start, abandon: reject });
      this.dispatch();
    });
  }

  /**
   * Stop accepting work. In-flight units are never interrupted; they keep
   * their slots until they settle.
   */
  close(options: ClosePoolOptions = {}): void {
    this.closed = true;
    if (options.abandonQueued) {
      const abandoned = this.queue.splice(0, this.queue.length);
      for (const unit of abandoned) {
        unit.abandon(new PoolClosedError("Worker pool closed before the unit started"));
      }
      this.notifyIfIdle();
    }
  }

  /**
   * Resolves once no unit is queued or running.
   */
  onIdle(): Promise<void> {
    if (this.isIdle()) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /**
   * Close the pool and wait for everything that will still run to finish.
   */
  async shutdown(options: ClosePoolOptions = {}): Promise<void> {
    this.close(options);
    await this.onIdle();
  }

  private dispatch(): void {
    while (this.active < this.size && this.queue.length > 0) {
      const next = this.queue.shift();
      next?.start();
    }
  }

  private release(): void {
    this.active--;
    this.dispatch();
    this.notifyIfIdle();
  }

  private isIdle(): boolean {
    return this.active === 0 && this.queue.length === 0;
  }

  private notifyIfIdle(): void {
    if (!this.isIdle() || this.idleWaiters.length === 0) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }
}
