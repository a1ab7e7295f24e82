export interface TaskLimiter {
  readonly maxActiveTasks: number;
  readonly active: number;
  tryAcquire: () => boolean;
  release: () => void;
}

/**
 * Counts active tasks against a cap. `tryAcquire` checks and increments in a
 * single step, so the cap holds for every caller on the event loop.
 * A non-positive `maxActiveTasks` means no cap.
 */
export function createTaskLimiter(maxActiveTasks: number): TaskLimiter {
  const limit = maxActiveTasks <= 0 ? Number.POSITIVE_INFINITY : maxActiveTasks;
  let activeTasks = 0;
  return {
    maxActiveTasks: limit,
    get active(): number {
      return activeTasks;
    },
    tryAcquire(): boolean {
      if (activeTasks >= limit) {
        return false;
      }
      activeTasks += 1;
      return true;
    },
    release(): void {
      if (activeTasks > 0) {
        activeTasks -= 1;
      }
    },
  };
}
