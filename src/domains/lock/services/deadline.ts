// Promise helpers for the verification wait

export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
}

export function deferred<T>(): Deferred<T> {
  let settle: ((value: T) => void) | undefined;
  const promise = new Promise<T>((resolve) => {
    settle = resolve;
  });
  return {
    promise,
    resolve(value: T): void {
      settle?.(value);
    },
  };
}

export interface Deadline {
  /** Settles once, when the timer fires. Never settles if cancelled first. */
  expired: Promise<{ kind: 'timeout' }>;
  cancel(): void;
}

/**
 * One timer per verification session. Retries share it, so the total
 * VERIFYING time is bounded by `ms` whatever the verifier does.
 */
export function createDeadline(ms: number): Deadline {
  const fired = deferred<{ kind: 'timeout' }>();
  const timer = setTimeout(() => fired.resolve({ kind: 'timeout' }), ms);
  return {
    expired: fired.promise,
    cancel(): void {
      clearTimeout(timer);
    },
  };
}
