export { DEFAULT_LOGGING_CONFIG, resolveLoggingConfig } from './config.js';
export { Dispatcher } from './dispatcher.js';
export type { DispatcherOptions } from './dispatcher.js';
export { dispatcherEvents } from './events.js';
export {
  createManualExecutor,
  immediateExecutor,
  inlineExecutor,
} from './executor.js';
export type { Executor, ManualExecutor } from './executor.js';
