/**
 * AbortSignal helpers for bounded network calls
 */

export interface ScopedSignal {
  signal: AbortSignal;
  /** Clears the timer and detaches from the parent signal */
  dispose(): void;
}

/**
 * A signal that aborts after `timeoutMs`, or as soon as `parent` aborts.
 */
export function scopedSignal(timeoutMs: number, parent?: AbortSignal): ScopedSignal {
  const controller = new AbortController();
  const timer = setTimeout(() => {
    controller.abort(new Error(`timed out after ${timeoutMs}ms`));
  }, timeoutMs);

  const onParentAbort = () => controller.abort(parent?.reason ?? new Error('aborted'));
  if (parent?.aborted) {
    onParentAbort();
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    }
  };
}

/**
 * Resolves with `onAbort()` when the signal aborts. Used to race work that
 * may ignore its signal.
 */
export function whenAborted<T>(signal: AbortSignal, onAbort: () => T): Promise<T> {
  return new Promise(resolve => {
    if (signal.aborted) {
      resolve(onAbort());
      return;
    }
    signal.addEventListener('abort', () => resolve(onAbort()), { once: true });
  });
}

export function abortMessage(signal: AbortSignal): string {
  const reason: unknown = signal.reason;
  if (reason instanceof Error) return reason.message;
  return reason === undefined ? 'aborted' : String(reason);
}
