/**
 * Replay solver: answers from the reference plan carried by the problem
 * document. Used by the reference endpoint and by the harness corpus.
 */

import { z } from "zod";
import {
  type SolveInvocation,
  type SolveOutcome,
  CapabilityDescriptor,
  failed,
  finishMeta,
  planFound,
  unsolvable,
} from "@planwire/core";
import { AbstractSolver, ONESHOT_PLANNER, type SolverDefinition } from "../solver.js";

const LOG_PREFIX = "planwire-client:replay";

export const ReplayOptionsSchema = z.object({}).strict();

export type ReplayOptions = z.infer<typeof ReplayOptionsSchema>;

export interface ReplaySolverConfig {
  /** Defaults to "replay" */
  name?: string;
  /** Defaults to the whole vocabulary */
  capabilities?: CapabilityDescriptor;
}

export function defineReplaySolver(config: ReplaySolverConfig = {}): SolverDefinition<ReplayOptions> {
  const definition: SolverDefinition<ReplayOptions> = {
    name: config.name ?? "replay",
    description: "Answers with the problem's reference plan",
    roles: ONESHOT_PLANNER,
    capabilities: config.capabilities ?? CapabilityDescriptor.all(),
    optionsSchema: ReplayOptionsSchema,
    create: (options, context) => new ReplaySolver({ definition, options, context }),
  };
  return definition;
}

class ReplaySolver extends AbstractSolver<ReplayOptions> {
  protected async execute(invocation: SolveInvocation): Promise<SolveOutcome> {
    const startedAt = this.clock.now();
    const { problem } = invocation;
    const reference = problem.document.referencePlan;
    const meta = () => finishMeta({ clock: this.clock, startedAt, solver: this.name() });

    if (reference === undefined) {
      return failed({
        code: "SOLVE_FAILURE",
        message: `${LOG_PREFIX}:execute - Problem ${problem.name} carries no reference plan`,
        details: { locator: problem.locator },
        meta: meta(),
      });
    }
    if (reference === null) return unsolvable(meta());
    return planFound({ format: reference.format, content: reference.content }, meta());
  }
}
