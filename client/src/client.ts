/**
 * PlanningClient: the caller's entry point.
 *
 * Holds a SolverRegistry of local and discovered remote solvers, opens solver
 * instances on demand and keeps them until close(). Problems without a named
 * solver are routed to the first registered solver that supports them.
 */

import {
  type CapabilityDescriptor,
  type Clock,
  type Logger,
  type Problem,
  type SolveOutcome,
  type SolverInfo,
  type SolverRole,
  ContractViolationError,
  errorMessage,
  immediateMeta,
  resolveLogger,
  toNatsUrl,
  TransportError,
  unsupported,
} from "@planwire/core";
import { type PlanningClientConfig, defaultPlanningClientConfig } from "./config.js";
import { SolverRegistry } from "./registry.js";
import type { Solver, SolverDefinition } from "./solver.js";
import { defineRemoteSolver } from "./solvers/remote.js";
import { describeEndpoint } from "./transport/describe.js";
import { type Connector, type RequestConnection, natsConnector } from "./transport/nats-transport.js";

const SERVICE_NAME = "planwire-client";

export interface PlanningClientOptions {
  config?: Partial<PlanningClientConfig>;
  /** Shared registry; a fresh one is created when omitted */
  registry?: SolverRegistry;
  loggerFactory?: Logger;
  connect?: Connector;
  clock?: Clock;
}

export interface ClientSolveOptions {
  /** Solver to use; negotiated from the problem's requirements when omitted */
  solver?: string;
  timeoutMs?: number;
}

export class PlanningClient {
  readonly registry: SolverRegistry;
  private readonly config: PlanningClientConfig;
  private readonly connect: Connector;
  private readonly clock?: Clock;
  private readonly log: Logger;
  /** One open instance per solver name */
  private readonly sessions = new Map<string, Promise<Solver>>();
  private closed = false;

  constructor(options: PlanningClientOptions = {}) {
    this.config = { ...defaultPlanningClientConfig, ...options.config };
    this.registry = options.registry ?? new SolverRegistry({ loggerFactory: options.loggerFactory, clock: options.clock });
    this.connect = options.connect ?? natsConnector;
    this.clock = options.clock;
    this.log = resolveLogger(options.loggerFactory, SERVICE_NAME);
  }

  register<O>(definition: SolverDefinition<O>): this {
    this.registry.register(definition);
    return this;
  }

  /**
   * Ask an endpoint for its solvers and register each as a remote solver.
   *
   * @throws TransportError when the endpoint cannot be reached
   * @throws ConfigurationError when a discovered name is already registered
   */
  async discover(address: string = this.config.address): Promise<SolverInfo[]> {
    const servers = toNatsUrl(address);
    let connection: RequestConnection;
    try {
      connection = await this.connect({ servers, name: this.config.connectionName });
    } catch (err) {
      throw new TransportError({
        message: `${SERVICE_NAME}:discover - Cannot connect to ${address}: ${errorMessage(err)}`,
        retryable: true,
        details: { address, servers },
        cause: err,
      });
    }

    let solvers: SolverInfo[];
    try {
      solvers = await describeEndpoint({
        connection,
        address,
        subjectPrefix: this.config.subjectPrefix,
        timeoutMs: this.config.describeTimeoutMs,
      });
    } finally {
      await connection.drain();
    }

    for (const info of solvers) {
      this.registry.register(
        defineRemoteSolver({ info, address, subjectPrefix: this.config.subjectPrefix, connect: this.connect })
      );
    }
    this.log.info?.(
      { address, solvers: solvers.map((s) => s.name) },
      `${SERVICE_NAME}:discover - Registered ${solvers.length} remote solver(s)`
    );
    return solvers;
  }

  requirementsOf(problem: Problem): CapabilityDescriptor {
    return problem.kind;
  }

  /**
   * @throws ConfigurationError when no solver has this name
   */
  capabilitiesOf(name: string): CapabilityDescriptor {
    return this.registry.require(name).capabilities;
  }

  negotiate(problem: Problem, role: SolverRole = "oneshotPlanner"): string | undefined {
    return this.registry.negotiate(problem.kind, role)?.name;
  }

  /**
   * Start a new solver instance owned by the caller; close() does not touch it.
   */
  async open(name: string, options?: unknown): Promise<Solver> {
    return this.registry.create(name, options);
  }

  /**
   * Solve with a named solver, or with the first registered solver that
   * supports the problem. No supporting solver is an `unsupported` outcome.
   */
  async solve(problem: Problem, options: ClientSolveOptions = {}): Promise<SolveOutcome> {
    const name = options.solver ?? this.negotiate(problem);
    if (name === undefined) {
      return unsupported({
        reason: `No registered solver supports ${problem.kind.describe()}`,
        missing: problem.kind.toRecord(),
        meta: immediateMeta({ clock: this.clock }),
      });
    }
    const solver = await this.session(name);
    return solver.solve(problem, { timeoutMs: options.timeoutMs ?? this.config.solveTimeoutMs });
  }

  /** Destroy every instance solve() opened. */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    const opened = [...this.sessions.values()];
    this.sessions.clear();
    const results = await Promise.allSettled(opened.map(async (pending) => (await pending).destroy()));
    for (const result of results) {
      if (result.status === "rejected") {
        this.log.warn?.({ error: errorMessage(result.reason) }, `${SERVICE_NAME}:close - Error destroying solver`);
      }
    }
    this.log.info?.({ count: opened.length }, `${SERVICE_NAME}:close - Closed`);
  }

  private async session(name: string): Promise<Solver> {
    if (this.closed) {
      throw new ContractViolationError({ message: `${SERVICE_NAME}:solve - Client is closed` });
    }
    let pending = this.sessions.get(name);
    if (!pending) {
      pending = this.registry.create(name);
      this.sessions.set(name, pending);
    }
    try {
      return await pending;
    } catch (err) {
      if (this.sessions.get(name) === pending) this.sessions.delete(name);
      throw err;
    }
  }
}
