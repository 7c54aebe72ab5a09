/**
 * Per-task mutual exclusion for result handling and finalization.
 *
 * Calls for the same task run one after another in arrival order; calls for
 * different tasks do not wait on each other. Single-process only.
 */

export interface TaskLockManager {
  /** Run `fn` once every earlier call for `taskId` has settled. */
  withLock<T>(taskId: string, fn: () => T | Promise<T>): Promise<T>;
}

export class InMemoryTaskLockManager implements TaskLockManager {
  /** Tail of each task's queue; removed when its last holder releases. */
  private readonly tails = new Map<string, Promise<void>>();

  async withLock<T>(taskId: string, fn: () => T | Promise<T>): Promise<T> {
    const previous = this.tails.get(taskId);
    let release: () => void = () => {};
    const tail = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.tails.set(taskId, tail);

    if (previous) await previous;
    try {
      return await fn();
    } finally {
      if (this.tails.get(taskId) === tail) this.tails.delete(taskId);
      release();
    }
  }

  isLocked(taskId: string): boolean {
    return this.tails.has(taskId);
  }

  /** Tasks with a holder or waiters. */
  lockedCount(): number {
    return this.tails.size;
  }
}
