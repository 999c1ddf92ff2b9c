/**
 * Shared utility functions for solve pipelines (client and endpoint side).
 */

import { PlanningError, errorMessage, isSolveFailureCode } from "./errors.js";
import type { SolveFailed, SolveMeta, SolveOutcome } from "./outcome.js";
import { failed, unsupported } from "./outcome.js";

export interface Clock {
  now(): number;
}

export const systemClock: Clock = { now: () => Date.now() };

/**
 * Largest delay timers accept. Used where a transport insists on a timeout
 * but the caller configured none.
 */
export const NO_TIMEOUT_MS = 2_147_483_647;

export interface CombinedSignal {
  signal: AbortSignal;
  /** Detaches the listeners added to the source signals. */
  dispose(): void;
}

/**
 * Combines multiple AbortSignals into one.
 * Returns immediately if any signal is already aborted.
 */
export function anySignal(signals: AbortSignal[]): CombinedSignal {
  const ctrl = new AbortController();
  const attached: { source: AbortSignal; onAbort: () => void }[] = [];
  const dispose = (): void => {
    for (const { source, onAbort } of attached.splice(0)) source.removeEventListener("abort", onAbort);
  };
  for (const s of signals) {
    if (s.aborted) {
      dispose();
      return { signal: s, dispose: () => {} };
    }
    const onAbort = (): void => {
      dispose();
      ctrl.abort(s.reason);
    };
    s.addEventListener("abort", onAbort, { once: true });
    attached.push({ source: s, onAbort });
  }
  return { signal: ctrl.signal, dispose };
}

/**
 * Creates outcome metadata with timing.
 */
export function finishMeta(args: { clock?: Clock; startedAt: number; solver?: string }): SolveMeta {
  const endedAt = (args.clock ?? systemClock).now();
  return {
    solver: args.solver,
    startedAtUnixMs: args.startedAt,
    endedAtUnixMs: endedAt,
    durationMs: endedAt - args.startedAt,
  };
}

/**
 * Creates an immediate outcome metadata (zero duration).
 */
export function immediateMeta(args: { clock?: Clock; solver?: string } = {}): SolveMeta {
  const now = (args.clock ?? systemClock).now();
  return { solver: args.solver, startedAtUnixMs: now, endedAtUnixMs: now, durationMs: 0 };
}

/**
 * Turns anything thrown during a solve into an outcome. PlanningErrors keep
 * their code; UNSUPPORTED_PROBLEM becomes an `unsupported` outcome; anything
 * else is an INTERNAL_ERROR failure.
 */
export function toFailureOutcome(args: {
  err: unknown;
  startedAt: number;
  clock?: Clock;
  solver?: string;
}): SolveOutcome {
  const meta = finishMeta({ clock: args.clock, startedAt: args.startedAt, solver: args.solver });

  if (args.err instanceof PlanningError) {
    if (args.err.code === "UNSUPPORTED_PROBLEM") {
      return unsupported({ reason: args.err.message, missing: {}, meta });
    }
    if (isSolveFailureCode(args.err.code)) {
      return failed({
        code: args.err.code,
        message: args.err.message,
        retryable: args.err.retryable,
        details: args.err.details,
        meta,
      });
    }
  }

  return internalFailure({ err: args.err, meta });
}

function internalFailure(args: { err: unknown; meta: SolveMeta }): SolveFailed {
  return failed({
    code: "INTERNAL_ERROR",
    message: errorMessage(args.err),
    retryable: false,
    meta: args.meta,
  });
}
