/**
 * One-shot mode: solve a single problem in-process, print the OUTCOME line
 * and report the exit code for the outcome.
 */

import {
  type Clock,
  type ExitCodeValue,
  type Logger,
  type Problem,
  type SolveOutcome,
  exitCodeForOutcome,
  formatOutcomeLine,
  loadProblem as loadProblemFile,
  resolveLogger,
  summarizeOutcome,
  systemClock,
  toFailureOutcome,
} from "@planwire/core";
import type { SolverHost } from "./solver-host.js";

const LOG_PREFIX = "planwire-server:oneshot";

export interface OneShotResult {
  outcome: SolveOutcome;
  exitCode: ExitCodeValue;
}

export async function runOneShot(params: {
  host: SolverHost;
  locator: string;
  solver?: string;
  timeoutMs?: number;
  loadProblem?: (locator: string) => Promise<Problem>;
  /** Receives the OUTCOME line; defaults to stdout */
  write?: (line: string) => void;
  loggerFactory?: Logger;
  clock?: Clock;
}): Promise<OneShotResult> {
  const log = resolveLogger(params.loggerFactory, LOG_PREFIX);
  const clock = params.clock ?? systemClock;
  const load = params.loadProblem ?? ((locator: string) => loadProblemFile(locator));
  const write = params.write ?? ((line: string) => process.stdout.write(`${line}\n`));

  const startedAt = clock.now();
  let outcome: SolveOutcome;
  await params.host.start();
  try {
    const problem = await load(params.locator);
    outcome = await params.host.solve(problem, { solver: params.solver, timeoutMs: params.timeoutMs });
  } catch (err) {
    outcome = toFailureOutcome({ err, startedAt, clock });
  } finally {
    await params.host.stop();
  }

  const exitCode = exitCodeForOutcome(outcome);
  log.info?.({ locator: params.locator, exitCode }, `${LOG_PREFIX}:runOneShot - ${summarizeOutcome(outcome)}`);
  write(formatOutcomeLine(outcome));
  return { outcome, exitCode };
}
