/**
 * Endpoint message handling: decode one request, solve, build the reply.
 *
 * Handlers never throw; every problem with a request becomes a `failure`
 * outcome in the response.
 */

import {
  type Clock,
  type DescribeResponse,
  type Logger,
  type Problem,
  type SolveResponse,
  CapabilityDescriptor,
  SolveRequestSchema,
  decodeMessage,
  errorMessage,
  failed,
  immediateMeta,
  loadProblem as loadProblemFile,
  silentLogger,
  systemClock,
  toFailureOutcome,
} from "@planwire/core";
import type { SolverHost } from "./solver-host.js";

const LOG_PREFIX = "planwire-server:handler";

export interface HandleSolveMessageParams {
  /** Raw request body (JSON string or buffer) */
  body: string | Uint8Array;
  host: SolverHost;
  loadProblem?: (locator: string) => Promise<Problem>;
  log?: Logger;
  clock?: Clock;
}

/**
 * Decode and validate a SolveRequest, load its problem and solve it.
 */
export async function handleSolveMessage(params: HandleSolveMessageParams): Promise<SolveResponse> {
  const { body, host } = params;
  const log = params.log ?? silentLogger;
  const clock = params.clock ?? systemClock;
  const load = params.loadProblem ?? ((locator: string) => loadProblemFile(locator));

  let raw: unknown;
  try {
    raw = decodeMessage(body);
  } catch (err) {
    log.warn?.({ error: errorMessage(err) }, `${LOG_PREFIX}:handleSolveMessage - Invalid JSON`);
    return invalidRequest({ id: "", message: "Invalid JSON body", clock });
  }

  const parsed = SolveRequestSchema.safeParse(raw);
  if (!parsed.success) {
    log.warn?.({ errors: parsed.error.flatten() }, `${LOG_PREFIX}:handleSolveMessage - Invalid solve request`);
    return invalidRequest({
      id: requestIdOf(raw),
      message: "Invalid solve request",
      details: parsed.error.flatten(),
      clock,
    });
  }

  const request = parsed.data;
  log.info?.(
    { id: request.id, locator: request.locator, solver: request.solver },
    `${LOG_PREFIX}:handleSolveMessage - Solve request received`
  );

  const startedAt = clock.now();
  try {
    const problem = await load(request.locator);
    const declared = CapabilityDescriptor.fromRecord(request.requires);
    if (!declared.equals(problem.kind)) {
      log.warn?.(
        { id: request.id, declared: declared.describe(), actual: problem.kind.describe() },
        `${LOG_PREFIX}:handleSolveMessage - Declared requirements differ from the problem; using the problem's`
      );
    }
    const outcome = await host.solve(problem, { solver: request.solver, timeoutMs: request.timeoutMs });
    return { id: request.id, outcome };
  } catch (err) {
    log.error?.(
      { id: request.id, locator: request.locator, error: errorMessage(err) },
      `${LOG_PREFIX}:handleSolveMessage - Solve failed`
    );
    return { id: request.id, outcome: toFailureOutcome({ err, startedAt, clock }) };
  }
}

export function handleDescribeMessage(params: { host: SolverHost }): DescribeResponse {
  return { solvers: params.host.describe() };
}

function invalidRequest(args: { id: string; message: string; details?: unknown; clock: Clock }): SolveResponse {
  return {
    id: args.id,
    outcome: failed({
      code: "INVALID_REQUEST",
      message: `${LOG_PREFIX}:handleSolveMessage - ${args.message}`,
      details: args.details,
      meta: immediateMeta({ clock: args.clock }),
    }),
  };
}

function requestIdOf(raw: unknown): string {
  if (typeof raw === "object" && raw !== null && "id" in raw && typeof raw.id === "string") return raw.id;
  return "";
}
