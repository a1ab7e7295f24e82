type Callback = (...args: never[]) => void;

/**
 * Ordered callback registrations for one notification channel. `invoke`
 * iterates a snapshot, so callbacks may add or remove registrations while
 * being notified; the change applies from the next notification.
 */
export class CallbackList<T extends Callback> {
  private callbacks: readonly T[] = [];

  add(callback: T): void {
    this.callbacks = [...this.callbacks, callback];
  }

  /** Removes the earliest registration of `callback`. */
  remove(callback: T): boolean {
    const index = this.callbacks.indexOf(callback);
    if (index === -1) {
      return false;
    }
    this.callbacks = this.callbacks.filter((_, i) => i !== index);
    return true;
  }

  /**
   * Calls every registered callback through `call`. A callback that throws
   * is reported to `onError` and the rest still run.
   */
  invoke(call: (callback: T) => void, onError: (error: unknown) => void): void {
    const snapshot = this.callbacks;
    for (const callback of snapshot) {
      try {
        call(callback);
      } catch (error) {
        onError(error);
      }
    }
  }
}
