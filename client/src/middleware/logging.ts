import { type Clock, type Logger, type Middleware, summarizeOutcome, systemClock } from "@planwire/core";

/** Logs the start and the outcome of every solve call. */
export function createLoggingMiddleware(deps: { label: string; log: Logger; clock?: Clock }): Middleware {
  const clock = deps.clock ?? systemClock;
  return (next) => async (invocation, signal) => {
    const startedAt = clock.now();
    const ctx = { solver: deps.label, id: invocation.id, problem: invocation.problem.name };
    deps.log.info?.({ ...ctx, locator: invocation.problem.locator }, `${deps.label}.solve: Solve started`);
    const outcome = await next(invocation, signal);
    deps.log.info?.(
      { ...ctx, status: outcome.status, durationMs: clock.now() - startedAt },
      `${deps.label}.solve: ${summarizeOutcome(outcome)}`
    );
    return outcome;
  };
}
