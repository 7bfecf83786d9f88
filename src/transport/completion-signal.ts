/**
 * Single-fire completion signal with a bounded wait.
 *
 * BLE notifications arrive through callbacks, while an acquisition session
 * is written as straight-line async code. The signal bridges the two: the
 * notification callback fires it once, and the session awaits it with a
 * timeout.
 */

import { NotificationTimeoutError } from '../exceptions';

interface PendingWaiter {
  resolve: () => void;
  timeoutId: ReturnType<typeof setTimeout>;
}

export class CompletionSignal {
  private fired = false;
  private waiters: PendingWaiter[] = [];

  /**
   * Whether the signal has fired.
   */
  get isSet(): boolean {
    return this.fired;
  }

  /**
   * Number of callers currently waiting.
   */
  get pendingCount(): number {
    return this.waiters.length;
  }

  /**
   * Fire the signal, releasing every waiter. Later calls are no-ops.
   */
  set(): void {
    if (this.fired) {
      return;
    }
    this.fired = true;

    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      clearTimeout(waiter.timeoutId);
      waiter.resolve();
    }
  }

  /**
   * Wait for the signal.
   *
   * Resolves immediately if it already fired.
   *
   * @param timeoutMs - Maximum time to wait in milliseconds
   * @throws {NotificationTimeoutError} If the signal does not fire in time
   */
  async wait(timeoutMs: number): Promise<void> {
    if (this.fired) {
      return;
    }

    return new Promise<void>((resolve, reject) => {
      const waiter: PendingWaiter = {
        resolve,
        timeoutId: setTimeout(() => {
          const index = this.waiters.indexOf(waiter);
          if (index !== -1) {
            this.waiters.splice(index, 1);
            reject(
              new NotificationTimeoutError(
                `No notification received within ${timeoutMs}ms timeout`
              )
            );
          }
        }, timeoutMs),
      };

      this.waiters.push(waiter);
    });
  }
}
