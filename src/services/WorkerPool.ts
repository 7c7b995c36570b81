/**
 * @fileoverview Bounded worker pool with FIFO admission.
 *
 * Runs at most `size` tasks at once; further tasks wait in submission order until a slot
 * frees. The daemon keeps two pools: one for slicer invocations and print streams, one
 * for client requests, so a flood of clients cannot starve job execution.
 *
 * Key Features:
 * - FIFO ordering of waiting tasks
 * - Statistics tracking (active, pending, completed, failed)
 * - drain() resolves once every accepted task has settled
 * - close() rejects new work during shutdown
 *
 * @module services/WorkerPool
 */

import { AppError, ErrorCode } from '../utils/error.utils';

interface PendingTask {
  readonly run: () => Promise<void>;
}

export interface WorkerPoolStats {
  readonly size: number;
  readonly active: number;
  readonly pending: number;
  readonly completed: number;
  readonly failed: number;
}

export class WorkerPool {
  private readonly queue: PendingTask[] = [];
  private active = 0;
  private closed = false;
  private completed = 0;
  private failed = 0;
  private idleWaiters: Array<() => void> = [];

  constructor(
    public readonly name: string,
    private readonly size: number
  ) {
    if (!Number.isInteger(size) || size < 1) {
      throw new AppError(`Worker pool "${name}" size must be a positive integer`, ErrorCode.CONFIG_INVALID, { size });
    }
  }

  /**
   * Schedule a task; the returned promise settles with the task's own result
   */
  public run<T>(task: () => Promise<T>): Promise<T> {
    if (this.closed) {
      return Promise.reject(new AppError(`Worker pool "${this.name}" is closed`, ErrorCode.UNKNOWN));
    }

    return new Promise<T>((resolve, reject) => {
      this.queue.push({
        run: async () => {
          try {
            resolve(await task());
            this.completed++;
          } catch (error) {
            this.failed++;
            reject(error);
          }
        }
      });
      this.pump();
    });
  }

  public getStats(): WorkerPoolStats {
    return {
      size: this.size,
      active: this.active,
      pending: this.queue.length,
      completed: this.completed,
      failed: this.failed
    };
  }

  /**
   * Resolves when no task is running or waiting
   */
  public drain(): Promise<void> {
    if (this.active === 0 && this.queue.length === 0) {
      return Promise.resolve();
    }
    return new Promise(resolve => {
      this.idleWaiters.push(resolve);
    });
  }

  /**
   * Stop accepting new tasks; already accepted tasks still run
   */
  public close(): void {
    this.closed = true;
  }

  private pump(): void {
    while (this.active < this.size && this.queue.length > 0) {
      const next = this.queue.shift();
      if (!next) {
        break;
      }
      this.active++;
      void next.run().finally(() => {
        this.active--;
        this.pump();
        this.notifyIdle();
      });
    }
  }

  private notifyIdle(): void {
    if (this.active > 0 || this.queue.length > 0) {
      return;
    }
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    waiters.forEach(resolve => resolve());
  }
}
