/**
 * Wake signal for background loops.
 *
 * A loop awaits `wait(timeoutMs)` when its queue is empty; producers call
 * `notify()` after enqueueing. A notify with no waiter is latched so the next
 * wait returns immediately.
 */
export class WakeSignal {
  private readonly waiters = new Set<() => void>();
  private latched = false;

  notify(): void {
    if (this.waiters.size === 0) {
      this.latched = true;
      return;
    }
    for (const wake of [...this.waiters]) wake();
  }

  /**
   * Resolves on `notify()` or after `timeoutMs`, whichever comes first. The
   * timer does not hold the process open unless `keepAlive` is set.
   */
  wait(timeoutMs: number, keepAlive = false): Promise<void> {
    if (this.latched) {
      this.latched = false;
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      const wake = () => {
        clearTimeout(timer);
        this.waiters.delete(wake);
        resolve();
      };
      const timer = setTimeout(wake, timeoutMs);
      if (!keepAlive) timer.unref();
      this.waiters.add(wake);
    });
  }

  waiting(): number {
    return this.waiters.size;
  }
}

/** Resolve `promise`, or `false` once `timeoutMs` has elapsed. */
export async function settleWithin(promise: Promise<unknown>, timeoutMs: number): Promise<boolean> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<false>((resolve) => {
    timer = setTimeout(() => resolve(false), timeoutMs);
    timer.unref();
  });
  try {
    return await Promise.race([promise.then(() => true as const), timeout]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}
