/**
 * Solve protocol wire envelope (NATS request/reply, JSON).
 *
 * A request names the endpoint address and a single problem locator; the
 * endpoint answers with a structured SolveOutcome.
 */

import { randomUUID } from "node:crypto";
import type { CapabilityRecord } from "./capabilities.js";
import type { SolveOutcome } from "./outcome.js";
import type { Problem } from "./problem.js";

export const DEFAULT_SUBJECT_PREFIX = "planwire";

export type SolverRoles = {
  oneshotPlanner: boolean;
  planValidator: boolean;
  grounder: boolean;
};

export type SolverRole = keyof SolverRoles;

export type SolveRequest = {
  id: string;
  /** Endpoint address (host:port) the request is sent to */
  address: string;
  /** Opaque problem locator, a file path in the reference deployment */
  locator: string;
  /** Capabilities computed from the problem */
  requires: CapabilityRecord;
  /** Solver to use; the endpoint negotiates one when omitted */
  solver?: string;
  timeoutMs?: number;
};

export type SolveResponse = {
  id: string;
  outcome: SolveOutcome;
};

export type SolverInfo = {
  name: string;
  roles: SolverRoles;
  capabilities: CapabilityRecord;
};

export type DescribeResponse = {
  solvers: SolverInfo[];
};

export function solveSubject(prefix: string = DEFAULT_SUBJECT_PREFIX): string {
  return `${prefix}.solve`;
}

export function describeSubject(prefix: string = DEFAULT_SUBJECT_PREFIX): string {
  return `${prefix}.describe`;
}

/**
 * Build a fresh request for one solve call.
 */
export function createSolveRequest(params: {
  address: string;
  problem: Problem;
  solver?: string;
  timeoutMs?: number;
  id?: string;
}): SolveRequest {
  return {
    id: params.id ?? randomUUID(),
    address: params.address,
    locator: params.problem.locator,
    requires: params.problem.kind.toRecord(),
    solver: params.solver,
    timeoutMs: params.timeoutMs,
  };
}

export function encodeMessage(message: unknown): Uint8Array {
  return new TextEncoder().encode(JSON.stringify(message));
}

export function decodeMessage(data: string | Uint8Array): unknown {
  const text = typeof data === "string" ? data : new TextDecoder().decode(data);
  return JSON.parse(text);
}
