/**
 * The solvers an endpoint serves: registered from config, started together,
 * destroyed together.
 */

import {
  type Clock,
  type Logger,
  type Problem,
  type SolveOutcome,
  type SolverInfo,
  type SpawnFn,
  CapabilityDescriptor,
  failed,
  immediateMeta,
  resolveLogger,
  unsupported,
} from "@planwire/core";
import { type Solver, SolverRegistry, defineCommandSolver, defineReplaySolver } from "@planwire/client";
import type { SolverEntry } from "./config.js";

const LOG_PREFIX = "planwire-server:solver-host";

export class SolverHost {
  private readonly registry: SolverRegistry;
  private readonly options = new Map<string, unknown>();
  private readonly solvers = new Map<string, Solver>();
  private readonly log: Logger;
  private readonly clock?: Clock;

  constructor(params: { registry?: SolverRegistry; loggerFactory?: Logger; clock?: Clock } = {}) {
    this.registry = params.registry ?? new SolverRegistry({ loggerFactory: params.loggerFactory, clock: params.clock });
    this.log = resolveLogger(params.loggerFactory, LOG_PREFIX);
    this.clock = params.clock;
  }

  /**
   * Register every configured solver, in config order.
   *
   * @throws ConfigurationError on an invalid entry or a duplicate name
   */
  static fromConfig(
    entries: readonly SolverEntry[],
    deps: { loggerFactory?: Logger; clock?: Clock; spawn?: SpawnFn } = {}
  ): SolverHost {
    const host = new SolverHost({ loggerFactory: deps.loggerFactory, clock: deps.clock });
    for (const entry of entries) {
      if (entry.type === "replay") {
        const definition = defineReplaySolver({
          name: entry.name,
          capabilities: entry.capabilities ? CapabilityDescriptor.fromRecord(entry.capabilities) : undefined,
        });
        host.registry.register(definition);
        host.add(definition.name, entry.options);
      } else {
        const { type: _type, options, ...command } = entry;
        const definition = defineCommandSolver(command, { spawn: deps.spawn });
        host.registry.register(definition);
        host.add(definition.name, options);
      }
    }
    return host;
  }

  /** Instance options for a registered solver, used by start(). */
  add(name: string, options: unknown): this {
    this.options.set(name, options ?? {});
    return this;
  }

  /**
   * Create and start every registered solver. A failure destroys the ones
   * already started.
   */
  async start(): Promise<void> {
    for (const definition of this.registry.list()) {
      try {
        const solver = await this.registry.create(definition.name, this.options.get(definition.name) ?? {});
        this.solvers.set(definition.name, solver);
      } catch (err) {
        await this.stop();
        throw err;
      }
    }
    this.log.info?.({ solvers: [...this.solvers.keys()] }, `${LOG_PREFIX}:start - Solvers ready`);
  }

  describe(): SolverInfo[] {
    return this.registry.describe();
  }

  /**
   * Solve with the named solver, or the first hosted solver that supports
   * the problem.
   */
  async solve(problem: Problem, options: { solver?: string; timeoutMs?: number } = {}): Promise<SolveOutcome> {
    const name = options.solver ?? this.registry.negotiate(problem.kind)?.name;
    if (name === undefined) {
      return unsupported({
        reason: `No hosted solver supports ${problem.kind.describe()}`,
        missing: problem.kind.toRecord(),
        meta: immediateMeta({ clock: this.clock }),
      });
    }
    const solver = this.solvers.get(name);
    if (!solver) {
      return failed({
        code: "INVALID_REQUEST",
        message: `${LOG_PREFIX}:solve - Unknown solver "${name}"`,
        details: { solver: name, hosted: [...this.solvers.keys()] },
        meta: immediateMeta({ clock: this.clock }),
      });
    }
    return solver.solve(problem, { timeoutMs: options.timeoutMs });
  }

  async stop(): Promise<void> {
    const solvers = [...this.solvers.values()];
    this.solvers.clear();
    await Promise.all(solvers.map((solver) => solver.destroy()));
  }
}
