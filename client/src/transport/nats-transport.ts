/**
 * NATS transport core for remote solve pipelines.
 *
 * This function is the "core" of a remote solver's pipeline: it runs
 * innermost, after the capability gate and deadline middleware. It sends one
 * SolveRequest to the endpoint's solve subject and decodes the SolveResponse.
 *
 * Transport problems never escape as exceptions: a timed-out request is a
 * TIMEOUT failure, anything else that keeps a valid response from arriving is
 * a TRANSPORT_ERROR failure.
 */

import { ErrorCode, connect } from "nats";
import {
  type Clock,
  type SolveHandler,
  type SolveOutcome,
  DEFAULT_SUBJECT_PREFIX,
  NO_TIMEOUT_MS,
  SolveResponseSchema,
  createSolveRequest,
  decodeMessage,
  encodeMessage,
  errorMessage,
  failed,
  finishMeta,
  solveSubject,
  systemClock,
} from "@planwire/core";

const SERVICE_NAME = "planwire-client:nats-transport";

// ── Connections ─────────────────────────────────────────────────────

/** The request/reply surface of a NATS connection. */
export interface RequestConnection {
  request(subject: string, data?: Uint8Array, opts?: { timeout: number }): Promise<{ data: Uint8Array }>;
  drain(): Promise<void>;
}

export type Connector = (opts: { servers: string; name?: string }) => Promise<RequestConnection>;

export const natsConnector: Connector = (opts) => connect(opts);

// ── Error mapping ───────────────────────────────────────────────────

function natsErrorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") return err.code;
  return undefined;
}

export function isTimeoutError(err: unknown): boolean {
  return natsErrorCode(err) === ErrorCode.Timeout;
}

export function isNoRespondersError(err: unknown): boolean {
  return natsErrorCode(err) === ErrorCode.NoResponders;
}

// ── Core ────────────────────────────────────────────────────────────

/**
 * Creates the core handler for a remote solver pipeline.
 *
 * Usage:
 *   const core = createNatsSolveCore({ connection, address, solver: "aries" });
 *   const pipeline = buildPipeline({ middleware: [...], core });
 */
export function createNatsSolveCore(params: {
  connection: RequestConnection;
  /** host:port of the endpoint, echoed into every request */
  address: string;
  subjectPrefix?: string;
  /** Solver to ask the endpoint for; the endpoint negotiates when omitted */
  solver?: string;
  clock?: Clock;
}): SolveHandler {
  const clock = params.clock ?? systemClock;
  const subject = solveSubject(params.subjectPrefix ?? DEFAULT_SUBJECT_PREFIX);

  return async (invocation, signal): Promise<SolveOutcome> => {
    const startedAt = clock.now();
    const meta = () => finishMeta({ clock, startedAt, solver: params.solver });
    const transportFailure = (message: string, details: Record<string, unknown>) =>
      failed({
        code: "TRANSPORT_ERROR",
        message: `${SERVICE_NAME}:solve - ${message}`,
        retryable: true,
        details: { address: params.address, subject, locator: invocation.problem.locator, ...details },
        meta: meta(),
      });

    if (signal.aborted) {
      return failed({
        code: "CANCELLED",
        message: `${SERVICE_NAME}:solve - Cancelled before the request was sent`,
        meta: meta(),
      });
    }

    const request = createSolveRequest({
      id: invocation.id,
      address: params.address,
      problem: invocation.problem,
      solver: params.solver,
      timeoutMs: invocation.timeoutMs,
    });

    let data: Uint8Array;
    try {
      const reply = await params.connection.request(subject, encodeMessage(request), {
        timeout: invocation.timeoutMs ?? NO_TIMEOUT_MS,
      });
      data = reply.data;
    } catch (err) {
      if (isTimeoutError(err)) {
        return failed({
          code: "TIMEOUT",
          message: `${SERVICE_NAME}:solve - No response from ${params.address} within ${invocation.timeoutMs ?? NO_TIMEOUT_MS}ms`,
          retryable: true,
          details: { address: params.address, subject, locator: invocation.problem.locator },
          meta: meta(),
        });
      }
      if (isNoRespondersError(err)) {
        return transportFailure(`No endpoint is listening on ${subject} at ${params.address}`, {});
      }
      return transportFailure(`Request to ${params.address} failed: ${errorMessage(err)}`, {
        error: errorMessage(err),
      });
    }

    let decoded: unknown;
    try {
      decoded = decodeMessage(data);
    } catch (err) {
      return transportFailure("Response is not valid JSON", { error: errorMessage(err) });
    }
    const parsed = SolveResponseSchema.safeParse(decoded);
    if (!parsed.success) {
      return transportFailure("Malformed solve response", { errors: parsed.error.flatten() });
    }
    if (parsed.data.id !== request.id) {
      return transportFailure(`Response id ${parsed.data.id} does not match request ${request.id}`, {});
    }
    return parsed.data.outcome;
  };
}
