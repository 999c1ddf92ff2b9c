/**
 * Solve outcomes: the tagged result of every solve attempt.
 *
 * "No plan exists", "the solver refused the problem" and "the attempt broke"
 * are separate variants, never a bare null.
 */

import type { CapabilityRecord } from "./capabilities.js";
import type { SolveFailureCode } from "./errors.js";

// ── Plan ────────────────────────────────────────────────────────────

/**
 * Opaque plan payload. `format` names the solver's plan syntax
 * (e.g. "sequential", "time-triggered"); `content` is passed through untouched.
 */
export interface Plan {
  format: string;
  content: string;
}

// ── Meta ────────────────────────────────────────────────────────────

export interface SolveMeta {
  /** Name of the solver that produced the outcome, when one was reached */
  solver?: string;
  startedAtUnixMs: number;
  endedAtUnixMs: number;
  durationMs: number;
}

// ── Outcome variants ────────────────────────────────────────────────

export type PlanFound = {
  status: "plan";
  plan: Plan;
  meta: SolveMeta;
};

export type Unsolvable = {
  status: "unsolvable";
  meta: SolveMeta;
};

export type Unsupported = {
  status: "unsupported";
  reason: string;
  /** Required capabilities the solver does not advertise */
  missing: CapabilityRecord;
  meta: SolveMeta;
};

export type SolveFailed = {
  status: "failure";
  error: {
    code: SolveFailureCode;
    message: string;
    retryable: boolean;
    details?: unknown;
  };
  meta: SolveMeta;
};

export type SolveOutcome = PlanFound | Unsolvable | Unsupported | SolveFailed;

export type SolveStatus = SolveOutcome["status"];

// ── Constructors ────────────────────────────────────────────────────

export function planFound(plan: Plan, meta: SolveMeta): PlanFound {
  return { status: "plan", plan, meta };
}

export function unsolvable(meta: SolveMeta): Unsolvable {
  return { status: "unsolvable", meta };
}

export function unsupported(args: {
  reason: string;
  missing: CapabilityRecord;
  meta: SolveMeta;
}): Unsupported {
  return { status: "unsupported", reason: args.reason, missing: args.missing, meta: args.meta };
}

export function failed(args: {
  code: SolveFailureCode;
  message: string;
  retryable?: boolean;
  details?: unknown;
  meta: SolveMeta;
}): SolveFailed {
  return {
    status: "failure",
    error: {
      code: args.code,
      message: args.message,
      retryable: args.retryable ?? false,
      details: args.details,
    },
    meta: args.meta,
  };
}

export function isPlanFound(outcome: SolveOutcome): outcome is PlanFound {
  return outcome.status === "plan";
}

/** One-line summary for logs and CLI output. */
export function summarizeOutcome(outcome: SolveOutcome): string {
  switch (outcome.status) {
    case "plan":
      return `plan (${outcome.plan.format})`;
    case "unsolvable":
      return "unsolvable";
    case "unsupported":
      return `unsupported: ${outcome.reason}`;
    case "failure":
      return `failure ${outcome.error.code}: ${outcome.error.message}`;
  }
}
