/**
 * Solve pipeline and middleware composition (shared core).
 *
 * A middleware wraps a `next` handler using reduceRight, enabling pre/post
 * logic, error handling, and short-circuiting (e.g. answering `unsupported`
 * without reaching the solver).
 */

import type { SolveOutcome } from "./outcome.js";
import type { Problem } from "./problem.js";

/** One solve call travelling through a pipeline. */
export interface SolveInvocation {
  id: string;
  problem: Problem;
  /** Explicit deadline; no timeout applies when absent */
  timeoutMs?: number;
}

export type SolveHandler = (invocation: SolveInvocation, signal: AbortSignal) => Promise<SolveOutcome>;

/**
 * Canonical middleware signature for solve pipelines.
 */
export type Middleware = (next: SolveHandler) => SolveHandler;

/**
 * Composes an array of middleware around a core handler.
 *
 * Execution order follows array order:
 *   [mw0, mw1, mw2] + core  →  mw0( mw1( mw2( core ) ) )
 *
 * So mw0 runs first (outermost), core runs last (innermost).
 */
export function buildPipeline(params: { middleware: Middleware[]; core: SolveHandler }): SolveHandler {
  return params.middleware.reduceRight<SolveHandler>((next, mw) => mw(next), params.core);
}
