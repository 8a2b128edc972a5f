import { CancelledError } from '../../core/errors';

/**
 * Cooperative cancellation shared by every wait of a scan
 */
export class CancellationToken {
  private readonly controller = new AbortController();

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get isCancelled(): boolean {
    return this.controller.signal.aborted;
  }

  cancel(): void {
    if (!this.isCancelled) {
      this.controller.abort();
    }
  }

  /**
   * Run the listener on cancellation (immediately if already cancelled).
   * Returns a function that removes the listener.
   */
  onCancel(listener: () => void): () => void {
    if (this.isCancelled) {
      listener();
      return () => undefined;
    }
    const signal = this.controller.signal;
    signal.addEventListener('abort', listener, { once: true });
    return () => signal.removeEventListener('abort', listener);
  }

  throwIfCancelled(): void {
    if (this.isCancelled) {
      throw new CancelledError();
    }
  }
}

export type Sleeper = (ms: number, token?: CancellationToken) => Promise<void>;

/**
 * Wait for `ms`; rejects with CancelledError as soon as the token fires
 */
export const sleep: Sleeper = (ms, token) =>
  new Promise<void>((resolve, reject) => {
    if (token?.isCancelled) {
      reject(new CancelledError());
      return;
    }
    let dispose: () => void = () => undefined;
    const timer = setTimeout(() => {
      dispose();
      resolve();
    }, ms);
    if (token) {
      dispose = token.onCancel(() => {
        clearTimeout(timer);
        reject(new CancelledError());
      });
    }
  });

/**
 * Settle with the promise, or reject with CancelledError when the token fires first
 */
export function raceWithCancellation<T>(promise: Promise<T>, token: CancellationToken): Promise<T> {
  if (token.isCancelled) {
    // keep the losing promise from surfacing as an unhandled rejection
    promise.catch(() => undefined);
    return Promise.reject(new CancelledError());
  }
  let dispose: () => void = () => undefined;
  const cancelled = new Promise<never>((_, reject) => {
    dispose = token.onCancel(() => reject(new CancelledError()));
  });
  return Promise.race([promise, cancelled]).finally(() => dispose());
}

/**
 * Reject with the error from `onTimeout` when the promise does not settle within `ms`
 */
export function withTimeout<T>(promise: Promise<T>, ms: number, onTimeout: () => Error): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}
