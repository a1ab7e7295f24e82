interface Waiter {
  readonly resolve: (settled: boolean) => void;
  timer: NodeJS.Timeout | undefined;
}

/**
 * Promises that resolve once `isSettled` holds. Every `release` re-checks the
 * predicate for each waiter, so a release that races with new work leaves
 * the waiters parked.
 */
export class JoinBarrier {
  private readonly waiters = new Set<Waiter>();
  private readonly isSettled: () => boolean;

  constructor(isSettled: () => boolean) {
    this.isSettled = isSettled;
  }

  get waiting(): number {
    return this.waiters.size;
  }

  /**
   * Resolves `true` once settled. With a non-negative `timeoutMs`, resolves
   * after that long with whatever the predicate says at that moment.
   */
  wait(timeoutMs = -1): Promise<boolean> {
    if (this.isSettled()) {
      return Promise.resolve(true);
    }
    if (timeoutMs === 0) {
      return Promise.resolve(false);
    }

    return new Promise<boolean>((resolve) => {
      const waiter: Waiter = { resolve, timer: undefined };
      if (timeoutMs > 0) {
        waiter.timer = setTimeout(() => {
          this.waiters.delete(waiter);
          resolve(this.isSettled());
        }, timeoutMs);
      }
      this.waiters.add(waiter);
    });
  }

  release(): void {
    if (!this.isSettled()) {
      return;
    }
    for (const waiter of [...this.waiters]) {
      this.waiters.delete(waiter);
      if (waiter.timer) {
        clearTimeout(waiter.timer);
      }
      waiter.resolve(true);
    }
  }
}
