/**
 * Process exit codes and the OUTCOME line: the one-shot command-line form of
 * the solve protocol.
 *
 * The exit status is the coarse signal (0 = plan found); the OUTCOME line on
 * stdout carries the structured outcome for callers that read it.
 */

import { SolveOutcomeSchema } from "./envelope-schema.js";
import type { SolveOutcome, SolveStatus } from "./outcome.js";

export const ExitCode = {
  PLAN_FOUND: 0,
  FAILURE: 1,
  UNSOLVABLE: 2,
  UNSUPPORTED: 3,
  USAGE: 64,
  CONFIGURATION: 78,
} as const;

export type ExitCodeValue = (typeof ExitCode)[keyof typeof ExitCode];

const EXIT_CODE_BY_STATUS: Record<SolveStatus, ExitCodeValue> = {
  plan: ExitCode.PLAN_FOUND,
  failure: ExitCode.FAILURE,
  unsolvable: ExitCode.UNSOLVABLE,
  unsupported: ExitCode.UNSUPPORTED,
};

export function exitCodeForOutcome(outcome: SolveOutcome): ExitCodeValue {
  return EXIT_CODE_BY_STATUS[outcome.status];
}

export function describeExitCode(code: number): string {
  switch (code) {
    case ExitCode.PLAN_FOUND:
      return "plan found";
    case ExitCode.FAILURE:
      return "solve failure";
    case ExitCode.UNSOLVABLE:
      return "no plan exists";
    case ExitCode.UNSUPPORTED:
      return "problem unsupported";
    case ExitCode.USAGE:
      return "usage error";
    case ExitCode.CONFIGURATION:
      return "configuration error";
    default:
      return `exit ${code}`;
  }
}

// ── OUTCOME line ────────────────────────────────────────────────────

export const OUTCOME_LINE_PREFIX = "OUTCOME=";

export function formatOutcomeLine(outcome: SolveOutcome): string {
  return `${OUTCOME_LINE_PREFIX}${JSON.stringify(outcome)}`;
}

/**
 * Find the last OUTCOME line in a process's stdout. Lines that are not valid
 * outcomes are ignored.
 */
export function parseOutcomeLine(stdout: string): SolveOutcome | undefined {
  const lines = stdout.split(/\r?\n/).reverse();
  for (const line of lines) {
    if (!line.startsWith(OUTCOME_LINE_PREFIX)) continue;
    let raw: unknown;
    try {
      raw = JSON.parse(line.slice(OUTCOME_LINE_PREFIX.length));
    } catch {
      continue;
    }
    const parsed = SolveOutcomeSchema.safeParse(raw);
    if (parsed.success) return parsed.data;
  }
  return undefined;
}
