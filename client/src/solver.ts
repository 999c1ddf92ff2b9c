/**
 * Solver plugin abstraction.
 *
 * A SolverDefinition is the static advertisement of a solver (name, roles,
 * capabilities, accepted options), resolved once when it is registered. A
 * Solver is one live instance with its own resources and lifecycle:
 *
 *   created ──start()──▶ ready ──destroy()──▶ destroyed
 *      │                   │ solve()*
 *      └──start() fails──▶ invalid
 */

import { randomUUID } from "node:crypto";
import type { z } from "zod";
import {
  type CapabilityDescriptor,
  type Clock,
  type Logger,
  type Middleware,
  type Problem,
  type SolveHandler,
  type SolveInvocation,
  type SolveOutcome,
  type SolverRoles,
  ConfigurationError,
  ContractViolationError,
  PlanningError,
  buildPipeline,
  resolveLogger,
  systemClock,
  toFailureOutcome,
} from "@planwire/core";
import { createCapabilityGateMiddleware } from "./middleware/capability-gate.js";
import { createDeadlineMiddleware } from "./middleware/deadline.js";
import { createLoggingMiddleware } from "./middleware/logging.js";

const LOG_PREFIX = "planwire-client:solver";

// ── Types ───────────────────────────────────────────────────────────

export type SolverState = "created" | "ready" | "destroyed" | "invalid";

export interface SolveOptions {
  /** Deadline for this call; overrides the solver's configured default */
  timeoutMs?: number;
}

export interface Solver {
  readonly state: SolverState;
  name(): string;
  capabilities(): CapabilityDescriptor;
  isOneshotPlanner(): boolean;
  isPlanValidator(): boolean;
  isGrounder(): boolean;
  /** True iff `problemCaps ≤ capabilities()` */
  supports(problemCaps: CapabilityDescriptor): boolean;
  start(): Promise<void>;
  solve(problem: Problem, options?: SolveOptions): Promise<SolveOutcome>;
  /** Idempotent; releases every process or connection the solver holds. */
  destroy(): Promise<void>;
}

/** Services handed to solvers at creation. */
export interface SolverContext {
  loggerFactory?: Logger;
  clock?: Clock;
}

export interface SolverDefinition<O = unknown> {
  readonly name: string;
  readonly description?: string;
  readonly roles: SolverRoles;
  readonly capabilities: CapabilityDescriptor;
  /** Strict schema: unrecognized option keys fail construction */
  readonly optionsSchema: z.ZodType<O, z.ZodTypeDef, unknown>;
  create(options: O, context: SolverContext): Solver;
}

export const ONESHOT_PLANNER: SolverRoles = { oneshotPlanner: true, planValidator: false, grounder: false };

// ── Base class ──────────────────────────────────────────────────────

/**
 * Lifecycle, contract checks and the solve pipeline shared by every solver.
 * Subclasses implement `execute` and, when they hold resources, `open` and
 * `release`.
 */
export abstract class AbstractSolver<O> implements Solver {
  protected readonly definition: SolverDefinition<O>;
  protected readonly options: O;
  protected readonly log: Logger;
  protected readonly clock: Clock;

  private currentState: SolverState = "created";
  private readonly lifetime = new AbortController();
  private pipeline?: SolveHandler;

  constructor(params: { definition: SolverDefinition<O>; options: O; context?: SolverContext }) {
    this.definition = params.definition;
    this.options = params.options;
    this.log = resolveLogger(params.context?.loggerFactory, `${LOG_PREFIX}:${params.definition.name}`);
    this.clock = params.context?.clock ?? systemClock;
  }

  get state(): SolverState {
    return this.currentState;
  }

  name(): string {
    return this.definition.name;
  }

  capabilities(): CapabilityDescriptor {
    return this.definition.capabilities;
  }

  isOneshotPlanner(): boolean {
    return this.definition.roles.oneshotPlanner;
  }

  isPlanValidator(): boolean {
    return this.definition.roles.planValidator;
  }

  isGrounder(): boolean {
    return this.definition.roles.grounder;
  }

  supports(problemCaps: CapabilityDescriptor): boolean {
    return this.capabilities().supports(problemCaps);
  }

  /**
   * Acquire resources and become ready. A failure leaves the solver invalid.
   */
  async start(): Promise<void> {
    if (this.currentState !== "created") {
      throw new ContractViolationError({
        message: `${LOG_PREFIX}:start - Solver "${this.name()}" is ${this.currentState}, expected created`,
      });
    }
    try {
      await this.open();
    } catch (err) {
      if (this.currentState === "created") this.currentState = "invalid";
      this.log.error?.(
        { solver: this.name(), error: err instanceof Error ? err.message : String(err) },
        `${LOG_PREFIX}:start - Solver failed to start`
      );
      throw err;
    }
    // destroy() may have run while open() was pending
    if (this.currentState !== "created") {
      await this.release();
      throw new ContractViolationError({
        message: `${LOG_PREFIX}:start - Solver "${this.name()}" was ${this.currentState} while starting`,
        details: { solver: this.name(), state: this.currentState },
      });
    }
    this.pipeline = buildPipeline({
      middleware: this.middleware(),
      core: (invocation, signal) => this.execute(invocation, signal),
    });
    this.currentState = "ready";
  }

  /**
   * Solve one problem. Unsupported problems are answered without running the
   * solver; errors inside the pipeline become `failure` outcomes.
   *
   * @throws ContractViolationError when the solver is not ready or is not a one-shot planner
   */
  async solve(problem: Problem, options: SolveOptions = {}): Promise<SolveOutcome> {
    if (this.currentState !== "ready" || !this.pipeline) {
      throw new ContractViolationError({
        message: `${LOG_PREFIX}:solve - Solver "${this.name()}" is ${this.currentState}`,
        details: { solver: this.name(), state: this.currentState },
      });
    }
    if (!this.isOneshotPlanner()) {
      throw new ContractViolationError({
        message: `${LOG_PREFIX}:solve - Solver "${this.name()}" does not advertise the one-shot planner role`,
        details: { solver: this.name(), roles: this.definition.roles },
      });
    }

    const invocation: SolveInvocation = {
      id: randomUUID(),
      problem,
      timeoutMs: options.timeoutMs ?? this.defaultTimeoutMs(),
    };
    const startedAt = this.clock.now();
    try {
      return await this.pipeline(invocation, this.lifetime.signal);
    } catch (err) {
      if (err instanceof ContractViolationError || err instanceof ConfigurationError) throw err;
      return toFailureOutcome({ err, startedAt, clock: this.clock, solver: this.name() });
    }
  }

  async destroy(): Promise<void> {
    if (this.currentState === "destroyed" || this.currentState === "invalid") return;
    this.currentState = "destroyed";
    this.lifetime.abort(
      new PlanningError({
        code: "CANCELLED",
        message: `${LOG_PREFIX}:destroy - Solver "${this.name()}" was destroyed`,
      })
    );
    await this.release();
    this.log.debug?.({ solver: this.name() }, `${LOG_PREFIX}:destroy - Destroyed`);
  }

  /** Pipeline around `execute`: logging → capability gate → deadline. */
  protected middleware(): Middleware[] {
    return [
      createLoggingMiddleware({ label: this.name(), log: this.log, clock: this.clock }),
      createCapabilityGateMiddleware({
        solver: this.name(),
        getCapabilities: () => this.capabilities(),
        clock: this.clock,
      }),
      createDeadlineMiddleware({ label: this.name() }),
    ];
  }

  /** Timeout applied when the caller gives none; none by default. */
  protected defaultTimeoutMs(): number | undefined {
    return undefined;
  }

  protected async open(): Promise<void> {}

  protected async release(): Promise<void> {}

  protected abstract execute(invocation: SolveInvocation, signal: AbortSignal): Promise<SolveOutcome>;
}
