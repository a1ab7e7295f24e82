export {
  createManualExecutor,
  DEFAULT_LOGGING_CONFIG,
  Dispatcher,
  dispatcherEvents,
  immediateExecutor,
  inlineExecutor,
  resolveLoggingConfig,
} from './engine/index.js';
export type {
  DispatcherOptions,
  Executor,
  ManualExecutor,
} from './engine/index.js';
export { ArgumentError, DispatcherError } from './lib/errors.js';
export type {
  AllCompleteCallback,
  ItemCompleteCallback,
  LoggingConfig,
  LogLevel,
  Task,
  TaskOutcome,
} from './lib/types.js';
