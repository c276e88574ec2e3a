/**
 * Timeout helpers for external calls.
 * Every LLM and document-store call carries its own deadline, combined with the
 * caller's cancellation signal.
 */

export interface DeadlineSignal {
  signal: AbortSignal;
  /** True when the deadline fired (as opposed to the caller cancelling). */
  timedOut: () => boolean;
}

export function deadline(timeoutMs: number, parent?: AbortSignal): DeadlineSignal {
  const timeout = AbortSignal.timeout(timeoutMs);
  const signal = parent ? AbortSignal.any([parent, timeout]) : timeout;
  return {
    signal,
    timedOut: () => timeout.aborted && !(parent?.aborted ?? false)
  };
}
