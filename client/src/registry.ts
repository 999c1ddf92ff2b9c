/**
 * Registry of solver definitions.
 *
 * Definitions are kept in registration order; negotiation picks the first
 * one that has the role and whose capabilities cover the problem.
 */

import type { ZodIssue } from "zod";
import {
  type CapabilityDescriptor,
  type Clock,
  type Logger,
  type SolverInfo,
  type SolverRole,
  ConfigurationError,
  resolveLogger,
} from "@planwire/core";
import type { Solver, SolverContext, SolverDefinition } from "./solver.js";

const LOG_PREFIX = "planwire-client:registry";

const SOLVER_NAME_PATTERN = /^[A-Za-z][\w.-]*$/;

/** Why a definition was or was not picked for a problem. */
export interface SolverEligibility {
  name: string;
  eligible: boolean;
  reason: string;
}

export class SolverRegistry {
  private readonly definitions = new Map<string, SolverDefinition>();
  private readonly loggerFactory?: Logger;
  private readonly clock?: Clock;
  private readonly log: Logger;

  constructor(params: { loggerFactory?: Logger; clock?: Clock } = {}) {
    this.loggerFactory = params.loggerFactory;
    this.clock = params.clock;
    this.log = resolveLogger(params.loggerFactory, LOG_PREFIX);
  }

  /**
   * @throws ConfigurationError on an invalid or duplicate name
   */
  register<O>(definition: SolverDefinition<O>): this {
    if (!SOLVER_NAME_PATTERN.test(definition.name)) {
      throw new ConfigurationError({
        message: `${LOG_PREFIX}:register - Invalid solver name "${definition.name}"`,
        details: { name: definition.name },
      });
    }
    if (this.definitions.has(definition.name)) {
      throw new ConfigurationError({
        message: `${LOG_PREFIX}:register - Solver "${definition.name}" is already registered`,
        details: { name: definition.name },
      });
    }
    this.definitions.set(definition.name, definition);
    this.log.debug?.(
      { solver: definition.name, capabilities: definition.capabilities.describe() },
      `${LOG_PREFIX}:register - Registered solver`
    );
    return this;
  }

  has(name: string): boolean {
    return this.definitions.has(name);
  }

  get(name: string): SolverDefinition | undefined {
    return this.definitions.get(name);
  }

  /**
   * @throws ConfigurationError when no solver has this name
   */
  require(name: string): SolverDefinition {
    const definition = this.definitions.get(name);
    if (!definition) {
      throw new ConfigurationError({
        message: `${LOG_PREFIX}:require - Unknown solver "${name}"`,
        details: { name, registered: [...this.definitions.keys()] },
      });
    }
    return definition;
  }

  list(): SolverDefinition[] {
    return [...this.definitions.values()];
  }

  describe(): SolverInfo[] {
    return this.list().map((definition) => ({
      name: definition.name,
      roles: { ...definition.roles },
      capabilities: definition.capabilities.toRecord(),
    }));
  }

  /**
   * First registered definition with `role` whose capabilities cover `kind`.
   */
  negotiate(kind: CapabilityDescriptor, role: SolverRole = "oneshotPlanner"): SolverDefinition | undefined {
    return this.list().find((definition) => definition.roles[role] && kind.isSubsumedBy(definition.capabilities));
  }

  explain(kind: CapabilityDescriptor, role: SolverRole = "oneshotPlanner"): SolverEligibility[] {
    return this.list().map((definition) => {
      if (!definition.roles[role]) {
        return { name: definition.name, eligible: false, reason: `lacks role ${role}` };
      }
      if (!kind.isSubsumedBy(definition.capabilities)) {
        const missing = kind.missingFrom(definition.capabilities);
        return { name: definition.name, eligible: false, reason: `missing ${JSON.stringify(missing)}` };
      }
      return { name: definition.name, eligible: true, reason: "supports every required capability" };
    });
  }

  /**
   * Validate options against the solver's schema, construct an instance and
   * start it.
   *
   * @throws ConfigurationError on an unknown solver or unrecognized options
   */
  async create(name: string, rawOptions: unknown = {}): Promise<Solver> {
    const definition = this.require(name);
    const parsed = definition.optionsSchema.safeParse(rawOptions);
    if (!parsed.success) {
      throw new ConfigurationError({
        message: `${LOG_PREFIX}:create - ${describeOptionIssues(name, parsed.error.issues)}`,
        details: { solver: name, issues: parsed.error.issues },
      });
    }

    const context: SolverContext = { loggerFactory: this.loggerFactory, clock: this.clock };
    const solver = definition.create(parsed.data, context);
    await solver.start();
    return solver;
  }
}

function describeOptionIssues(solver: string, issues: ZodIssue[]): string {
  const unknown = issues.flatMap((issue) => (issue.code === "unrecognized_keys" ? issue.keys : []));
  if (unknown.length > 0) {
    return `Unrecognized option(s) for solver "${solver}": ${unknown.join(", ")}`;
  }
  const first = issues[0];
  const path = first && first.path.length > 0 ? `${first.path.join(".")}: ` : "";
  return `Invalid options for solver "${solver}": ${path}${first?.message ?? "invalid"}`;
}
