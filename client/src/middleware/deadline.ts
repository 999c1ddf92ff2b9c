import { type Middleware, PlanningError, anySignal } from "@planwire/core";

/**
 * Deadline: aborts the inner signal after `invocation.timeoutMs`. Without a
 * timeout the call runs unbounded.
 */
export function createDeadlineMiddleware(deps: { label: string }): Middleware {
  return (next) => async (invocation, signal) => {
    const timeoutMs = invocation.timeoutMs;
    if (!timeoutMs || timeoutMs <= 0) return next(invocation, signal);

    const ctrl = new AbortController();
    const t = setTimeout(
      () =>
        ctrl.abort(
          new PlanningError({
            code: "TIMEOUT",
            message: `${deps.label}.deadline: Timeout after ${timeoutMs}ms`,
            retryable: true,
            details: { timeoutMs, locator: invocation.problem.locator },
          })
        ),
      timeoutMs
    );
    const combined = anySignal([signal, ctrl.signal]);
    try {
      return await next(invocation, combined.signal);
    } finally {
      clearTimeout(t);
      combined.dispose();
    }
  };
}
