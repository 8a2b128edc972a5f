import { CancelledError } from '../../core/errors';

import { CancellationToken } from './cancellation';

interface Waiter {
  resolve: () => void;
  reject: (error: Error) => void;
  dispose: () => void;
}

/**
 * Counting semaphore with FIFO waiters and cancellable acquisition
 */
export class Semaphore {
  private available: number;
  private readonly waiters: Waiter[] = [];

  constructor(private readonly permits: number) {
    if (!Number.isInteger(permits) || permits < 1) {
      throw new Error(`Semaphore needs at least one permit, got ${permits}`);
    }
    this.available = permits;
  }

  acquire(token?: CancellationToken): Promise<void> {
    if (token?.isCancelled) {
      return Promise.reject(new CancelledError());
    }
    if (this.available > 0) {
      this.available -= 1;
      return Promise.resolve();
    }
    return new Promise<void>((resolve, reject) => {
      const waiter: Waiter = { resolve, reject, dispose: () => undefined };
      if (token) {
        waiter.dispose = token.onCancel(() => {
          this.remove(waiter);
          reject(new CancelledError());
        });
      }
      this.waiters.push(waiter);
    });
  }

  release(): void {
    const next = this.waiters.shift();
    if (next) {
      // permit passes straight to the next waiter
      next.dispose();
      next.resolve();
      return;
    }
    if (this.available < this.permits) {
      this.available += 1;
    }
  }

  /**
   * Reject every waiter, e.g. when the resource behind the permits is gone
   */
  rejectAll(error: Error): void {
    const waiters = this.waiters.splice(0);
    for (const waiter of waiters) {
      waiter.dispose();
      waiter.reject(error);
    }
  }

  get availablePermits(): number {
    return this.available;
  }

  get waiting(): number {
    return this.waiters.length;
  }

  private remove(waiter: Waiter): void {
    const index = this.waiters.indexOf(waiter);
    if (index >= 0) {
      this.waiters.splice(index, 1);
    }
  }
}
