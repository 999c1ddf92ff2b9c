/**
 * Planning error classes (shared).
 *
 * One structured error carries a code from the planwire taxonomy; the
 * subclasses pin that code so callers can `instanceof` on the kind they care
 * about.
 */

// ── Error Codes ─────────────────────────────────────────────────────

/** Codes a solve attempt can end with (carried by `failure` outcomes). */
export type SolveFailureCode =
  | "SOLVE_FAILURE"
  | "TRANSPORT_ERROR"
  | "INVALID_REQUEST"
  | "INVALID_PROBLEM"
  | "TIMEOUT"
  | "CANCELLED"
  | "INTERNAL_ERROR";

export type PlanningErrorCode =
  | "CONFIGURATION_ERROR"
  | "UNSUPPORTED_PROBLEM"
  | "CONTRACT_VIOLATION"
  | SolveFailureCode;

const SOLVE_FAILURE_CODES: ReadonlySet<string> = new Set<SolveFailureCode>([
  "SOLVE_FAILURE",
  "TRANSPORT_ERROR",
  "INVALID_REQUEST",
  "INVALID_PROBLEM",
  "TIMEOUT",
  "CANCELLED",
  "INTERNAL_ERROR",
]);

export function isSolveFailureCode(code: string): code is SolveFailureCode {
  return SOLVE_FAILURE_CODES.has(code);
}

// ── Errors ──────────────────────────────────────────────────────────

export interface PlanningErrorArgs<C extends PlanningErrorCode = PlanningErrorCode> {
  code: C;
  message: string;
  retryable?: boolean;
  details?: unknown;
  cause?: unknown;
}

/**
 * Structured error for everything planwire reports.
 */
export class PlanningError extends Error {
  public readonly code: PlanningErrorCode;
  public readonly retryable: boolean;
  public readonly details?: unknown;

  constructor(args: PlanningErrorArgs) {
    super(args.message, args.cause === undefined ? undefined : { cause: args.cause });
    this.name = "PlanningError";
    this.code = args.code;
    this.retryable = args.retryable ?? false;
    this.details = args.details;
  }
}

type FixedCodeArgs = Omit<PlanningErrorArgs, "code">;

/** Unrecognized options, duplicate solver names, invalid config files. Never recovered. */
export class ConfigurationError extends PlanningError {
  constructor(args: FixedCodeArgs) {
    super({ ...args, code: "CONFIGURATION_ERROR", retryable: false });
    this.name = "ConfigurationError";
  }
}

/** A problem needs capabilities the solver does not advertise. */
export class UnsupportedProblemError extends PlanningError {
  constructor(args: FixedCodeArgs) {
    super({ ...args, code: "UNSUPPORTED_PROBLEM", retryable: false });
    this.name = "UnsupportedProblemError";
  }
}

/** The solver ran but crashed or could not produce a plan. */
export class SolveFailureError extends PlanningError {
  constructor(args: FixedCodeArgs) {
    super({ ...args, code: "SOLVE_FAILURE" });
    this.name = "SolveFailureError";
  }
}

/** The endpoint could not be reached or the process could not be launched. */
export class TransportError extends PlanningError {
  constructor(args: FixedCodeArgs) {
    super({ ...args, code: "TRANSPORT_ERROR" });
    this.name = "TransportError";
  }
}

/** Programming error: solve on a destroyed or role-mismatched solver, mutating a sealed builder. */
export class ContractViolationError extends PlanningError {
  constructor(args: FixedCodeArgs) {
    super({ ...args, code: "CONTRACT_VIOLATION", retryable: false });
    this.name = "ContractViolationError";
  }
}

/** Reads a message off anything thrown. */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
