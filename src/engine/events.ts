import { EventEmitter } from 'node:events';

import type { CallbackChannel } from '../lib/types.js';

import { logError } from './logger.js';

interface DispatcherEvents {
  'task:queued': [{ dispatcherId: string; queued: number }];
  'task:started': [
    { dispatcherId: string; running: number; fromQueue: boolean },
  ];
  'task:settled': [{ dispatcherId: string; ok: boolean }];
  'dispatcher:idle': [{ dispatcherId: string }];
  'callback:failed': [
    { dispatcherId: string; channel: CallbackChannel; error: unknown },
  ];
  error: [unknown];
}

interface TypedEmitter<T> extends Omit<EventEmitter, 'on' | 'off' | 'emit'> {
  on<K extends keyof T>(
    event: K,
    listener: (...args: T[K] extends unknown[] ? T[K] : never) => void
  ): this;
  off<K extends keyof T>(
    event: K,
    listener: (...args: T[K] extends unknown[] ? T[K] : never) => void
  ): this;
  emit<K extends keyof T>(
    event: K,
    ...args: T[K] extends unknown[] ? T[K] : never
  ): boolean;
}

export const dispatcherEvents = new EventEmitter({
  captureRejections: true,
}) as TypedEmitter<DispatcherEvents>;

type EventArgs<K extends keyof DispatcherEvents> =
  DispatcherEvents[K] extends unknown[] ? DispatcherEvents[K] : never;

/**
 * Emits a diagnostics event. A listener that throws is logged instead of
 * unwinding into the dispatcher's bookkeeping.
 */
export function emitDiagnostic<K extends keyof DispatcherEvents>(
  event: K,
  ...args: EventArgs<K>
): void {
  try {
    dispatcherEvents.emit(event, ...args);
  } catch (err) {
    logError(`Listener for "${event}" failed`, err);
  }
}

dispatcherEvents.on('callback:failed', ({ dispatcherId, channel, error }) => {
  logError(
    `${channel === 'item' ? 'Item' : 'All'}-complete callback failed (dispatcher ${dispatcherId})`,
    error
  );
});

dispatcherEvents.on('error', (err) => {
  logError('Diagnostics listener failed', err);
});
