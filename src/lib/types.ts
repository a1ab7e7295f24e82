/** A unit of work. A thenable return value keeps the task running until it settles. */
export type Task = () => unknown;

export type TaskOutcome =
  | { readonly ok: true }
  | { readonly ok: false; readonly error: unknown };

export type ItemCompleteCallback<TState = unknown> = (
  state: TState | undefined,
  outcome: TaskOutcome
) => void;

export type AllCompleteCallback = () => void;

export type CallbackChannel = 'item' | 'all';

export interface PendingTask<TState> {
  readonly task: Task;
  readonly state: TState | undefined;
}

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggingConfig {
  readonly enabled: boolean;
  readonly level: LogLevel;
}

export type LogMetadata = Record<string, unknown>;
