export interface DebounceOptions {
  debounceMs: number;
  /** Upper bound on how long a burst of events can postpone the flush */
  maxWaitMs: number;
}

export interface Debouncer<T> {
  push(key: string, event: T): void;
  /** Runs the pending batch now */
  flush(): void;
  /** Drops pending events and timers */
  cancel(): void;
  readonly pending: number;
}

/**
 * Collects events by key and hands the batch to `onFlush` once events stop
 * arriving for `debounceMs`, or `maxWaitMs` after the first pending event.
 * A later event for the same key replaces the earlier one.
 */
export function createDebouncer<T>(onFlush: (batch: T[]) => void, options: DebounceOptions): Debouncer<T> {
  const pending = new Map<string, T>();
  let debounceTimer: ReturnType<typeof setTimeout> | null = null;
  let maxWaitTimer: ReturnType<typeof setTimeout> | null = null;

  function clearTimers(): void {
    if (debounceTimer) clearTimeout(debounceTimer);
    if (maxWaitTimer) clearTimeout(maxWaitTimer);
    debounceTimer = null;
    maxWaitTimer = null;
  }

  function flush(): void {
    clearTimers();
    const batch = [...pending.values()];
    pending.clear();
    if (batch.length === 0) return;
    onFlush(batch);
  }

  return {
    push(key, event) {
      pending.set(key, event);

      if (debounceTimer) clearTimeout(debounceTimer);
      debounceTimer = setTimeout(flush, options.debounceMs);

      if (!maxWaitTimer) {
        maxWaitTimer = setTimeout(flush, options.maxWaitMs);
      }
    },
    flush,
    cancel() {
      clearTimers();
      pending.clear();
    },
    get pending() {
      return pending.size;
    },
  };
}
