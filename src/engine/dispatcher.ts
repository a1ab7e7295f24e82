import { randomUUID } from 'node:crypto';

import { createTaskLimiter, type TaskLimiter } from '../lib/concurrency.js';
import { isObjectRecord } from '../lib/errors.js';
import { FifoQueue } from '../lib/fifo-queue.js';
import type {
  AllCompleteCallback,
  CallbackChannel,
  ItemCompleteCallback,
  PendingTask,
  Task,
  TaskOutcome,
} from '../lib/types.js';
import { assertFunction } from '../lib/validators.js';
import {
  JoinTimeoutSchema,
  MaxAllowedSchema,
  parseArgument,
} from '../schemas/inputs.js';

import { CallbackList } from './callback-list.js';
import { emitDiagnostic } from './events.js';
import { type Executor, immediateExecutor } from './executor.js';
import { JoinBarrier } from './join-barrier.js';
import { logDebug, logInfo, logWarn } from './logger.js';

const SUCCESS: TaskOutcome = { ok: true };

interface SettledTask<TState> {
  readonly state: TState | undefined;
  readonly outcome: TaskOutcome;
}

export interface DispatcherOptions {
  /** Where started tasks run. Defaults to `immediateExecutor`. */
  readonly executor?: Executor;
}

function isThenable(value: unknown): value is PromiseLike<unknown> {
  return isObjectRecord(value) && typeof value.then === 'function';
}

/**
 * Runs submitted tasks with at most `maxAllowed` of them in flight, queueing
 * the rest in submission order.
 *
 * @example
 * const dispatcher = new Dispatcher<string>(2)
 *   .onItemComplete((name, outcome) => {
 *     if (!outcome.ok) console.error(name, outcome.error);
 *   })
 *   .submit(() => download('a'), 'a')
 *   .submit(() => download('b'), 'b')
 *   .submit(() => download('c'), 'c');
 * await dispatcher.join();
 */
export class Dispatcher<TState = unknown> {
  readonly id = randomUUID();
  private readonly limiter: TaskLimiter;
  private readonly executor: Executor;
  private readonly pending = new FifoQueue<PendingTask<TState>>();
  private readonly itemCallbacks = new CallbackList<
    ItemCompleteCallback<TState>
  >();
  private readonly allCallbacks = new CallbackList<AllCompleteCallback>();
  private readonly barrier = new JoinBarrier(() => this.countRunning() === 0);
  private readonly settled = new FifoQueue<SettledTask<TState>>();
  private draining = false;

  /** @param maxAllowed Running-task cap; zero or less means no cap. */
  constructor(maxAllowed: number, options: DispatcherOptions = {}) {
    this.limiter = createTaskLimiter(
      parseArgument(MaxAllowedSchema, maxAllowed, 'maxAllowed')
    );
    this.executor = options.executor ?? immediateExecutor;
  }

  /** Effective cap; `Infinity` when unbounded. */
  get maxAllowed(): number {
    return this.limiter.maxActiveTasks;
  }

  countRunning(): number {
    return this.limiter.active;
  }

  countQueued(): number {
    return this.pending.length;
  }

  submit(task: Task, state?: TState): this {
    assertFunction(task, 'task');

    const entry: PendingTask<TState> = { task, state };
    if (!this.limiter.tryAcquire()) {
      this.pending.push(entry);
      emitDiagnostic('task:queued', {
        dispatcherId: this.id,
        queued: this.pending.length,
      });
      logDebug('Task queued', {
        dispatcherId: this.id,
        queued: this.pending.length,
      });
      return this;
    }

    this.start(entry, false);
    return this;
  }

  onItemComplete(callback: ItemCompleteCallback<TState>): this {
    assertFunction(callback, 'callback');
    this.itemCallbacks.add(callback);
    return this;
  }

  offItemComplete(callback: ItemCompleteCallback<TState>): boolean {
    return this.itemCallbacks.remove(callback);
  }

  onAllComplete(callback: AllCompleteCallback): this {
    assertFunction(callback, 'callback');
    this.allCallbacks.add(callback);
    return this;
  }

  offAllComplete(callback: AllCompleteCallback): boolean {
    return this.allCallbacks.remove(callback);
  }

  /**
   * Resolves `true` once nothing is running. With a non-negative
   * `timeoutMs`, resolves after that long with whether nothing was running
   * by then. Tasks are never affected by the timeout.
   */
  join(timeoutMs?: number): Promise<boolean> {
    const timeout = parseArgument(JoinTimeoutSchema, timeoutMs, 'timeoutMs');
    return this.barrier.wait(timeout).then((settled) => {
      if (!settled) {
        logWarn('Join timed out with tasks still running', {
          dispatcherId: this.id,
          running: this.countRunning(),
          queued: this.countQueued(),
        });
      }
      return settled;
    });
  }

  // The caller has already acquired a slot for `entry`.
  private start(entry: PendingTask<TState>, fromQueue: boolean): void {
    const running = this.countRunning();
    emitDiagnostic('task:started', {
      dispatcherId: this.id,
      running,
      fromQueue,
    });
    logDebug(fromQueue ? 'Queued task started' : 'Task started', {
      dispatcherId: this.id,
      running,
    });

    this.executor.submit(() => {
      this.execute(entry);
    });
  }

  private execute(entry: PendingTask<TState>): void {
    let result: unknown;
    try {
      result = entry.task();
    } catch (error) {
      this.complete(entry.state, { ok: false, error });
      return;
    }

    if (!isThenable(result)) {
      this.complete(entry.state, SUCCESS);
      return;
    }

    void Promise.resolve(result).then(
      () => {
        this.complete(entry.state, SUCCESS);
      },
      (error: unknown) => {
        this.complete(entry.state, { ok: false, error });
      }
    );
  }

  /**
   * Records a settled task and, unless a drain is already in progress on
   * this stack, settles every recorded task in order. A synchronous executor
   * therefore drains the queue in a loop instead of nesting one frame per
   * queued task.
   */
  private complete(state: TState | undefined, outcome: TaskOutcome): void {
    this.settled.push({ state, outcome });
    if (this.draining) {
      return;
    }

    this.draining = true;
    try {
      let next = this.settled.shift();
      while (next) {
        try {
          this.settle(next.state, next.outcome);
        } catch (error) {
          emitDiagnostic('error', error);
        }
        next = this.settled.shift();
      }
    } finally {
      this.draining = false;
    }
  }

  private settle(state: TState | undefined, outcome: TaskOutcome): void {
    this.itemCallbacks.invoke(
      (callback) => {
        callback(state, outcome);
      },
      (error) => {
        this.reportCallbackFailure('item', error);
      }
    );
    emitDiagnostic('task:settled', {
      dispatcherId: this.id,
      ok: outcome.ok,
    });

    this.limiter.release();

    if (this.startNextQueued()) {
      return;
    }
    if (this.countRunning() > 0) {
      return;
    }

    this.allCallbacks.invoke(
      (callback) => {
        callback();
      },
      (error) => {
        this.reportCallbackFailure('all', error);
      }
    );
    emitDiagnostic('dispatcher:idle', { dispatcherId: this.id });
    logInfo('All tasks complete', { dispatcherId: this.id });
    this.barrier.release();
  }

  private startNextQueued(): boolean {
    if (this.pending.length === 0 || !this.limiter.tryAcquire()) {
      return false;
    }
    const next = this.pending.shift();
    if (!next) {
      this.limiter.release();
      return false;
    }
    this.start(next, true);
    return true;
  }

  private reportCallbackFailure(channel: CallbackChannel, error: unknown): void {
    emitDiagnostic('callback:failed', {
      dispatcherId: this.id,
      channel,
      error,
    });
  }
}
