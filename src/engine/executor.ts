/**
 * Where started tasks run. The dispatcher never invokes a task itself; it
 * hands a wrapper to `submit`, which must call it exactly once.
 */
export interface Executor {
  submit(work: () => void): void;
}

/** Runs each wrapper on its own event-loop turn, off the submitter's stack. */
export const immediateExecutor: Executor = {
  submit(work) {
    setImmediate(work);
  },
};

/** Runs each wrapper synchronously inside `submit`. */
export const inlineExecutor: Executor = {
  submit(work) {
    work();
  },
};

export interface ManualExecutor extends Executor {
  readonly pending: number;
  /** Runs the oldest recorded wrapper. Returns false when none is left. */
  runNext(): boolean;
  /** Runs wrappers until none is left, including ones submitted meanwhile. */
  runAll(): number;
}

export function createManualExecutor(): ManualExecutor {
  const work: (() => void)[] = [];

  const runNext = (): boolean => {
    const next = work.shift();
    if (!next) {
      return false;
    }
    next();
    return true;
  };

  return {
    get pending(): number {
      return work.length;
    },
    submit(item) {
      work.push(item);
    },
    runNext,
    runAll(): number {
      let ran = 0;
      while (runNext()) {
        ran += 1;
      }
      return ran;
    },
  };
}
