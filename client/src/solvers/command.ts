/**
 * Command solver: runs an external planner as a child process per solve.
 *
 * The command template names the problem through `{instance}` (the locator);
 * `{problem}` and `{domain}` are also available. Exit status 0 is a plan
 * whose content is the process's stdout.
 */

import { z } from "zod";
import {
  type SolveInvocation,
  type SolveOutcome,
  type SpawnFn,
  CapabilityDescriptor,
  CapabilityRecordSchema,
  ConfigurationError,
  PlanningError,
  failed,
  finishMeta,
  formatCommand,
  isSolveFailureCode,
  planFound,
  renderCommandTemplate,
  runProcess,
  unsolvable,
  validateCommandTemplate,
} from "@planwire/core";
import { AbstractSolver, ONESHOT_PLANNER, type SolverContext, type SolverDefinition } from "../solver.js";

const LOG_PREFIX = "planwire-client:command";

export const COMMAND_PLACEHOLDERS = ["instance", "problem", "domain"] as const;

/** Keep this much of stderr in failure details */
const STDERR_TAIL_CHARS = 2_000;

export const CommandSolverConfigSchema = z
  .object({
    name: z.string().min(1),
    description: z.string().optional(),
    command: z.string().min(1),
    capabilities: CapabilityRecordSchema,
    planFormat: z.string().min(1).default("sequential"),
    /** Exit statuses that mean "no plan exists" */
    unsolvableExitCodes: z.array(z.number().int()).default([]),
  })
  .strict();

export type CommandSolverConfig = z.input<typeof CommandSolverConfigSchema>;

export const CommandOptionsSchema = z
  .object({
    timeoutMs: z.number().int().positive().optional(),
    cwd: z.string().min(1).optional(),
    env: z.record(z.string()).optional(),
  })
  .strict();

export type CommandOptions = z.infer<typeof CommandOptionsSchema>;

/**
 * @throws ConfigurationError on an invalid config or command template
 */
export function defineCommandSolver(
  input: CommandSolverConfig,
  deps: { spawn?: SpawnFn } = {}
): SolverDefinition<CommandOptions> {
  const parsed = CommandSolverConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError({
      message: `${LOG_PREFIX}:define - Invalid command solver config`,
      details: parsed.error.flatten(),
    });
  }
  const config = parsed.data;
  validateCommandTemplate(config.command, { allowed: COMMAND_PLACEHOLDERS, required: ["instance"] });

  const definition: SolverDefinition<CommandOptions> = {
    name: config.name,
    description: config.description,
    roles: ONESHOT_PLANNER,
    capabilities: CapabilityDescriptor.fromRecord(config.capabilities),
    optionsSchema: CommandOptionsSchema,
    create: (options, context) =>
      new CommandSolver({
        definition,
        options,
        context,
        command: config.command,
        planFormat: config.planFormat,
        unsolvableExitCodes: config.unsolvableExitCodes,
        spawn: deps.spawn,
      }),
  };
  return definition;
}

class CommandSolver extends AbstractSolver<CommandOptions> {
  private readonly command: string;
  private readonly planFormat: string;
  private readonly unsolvableExitCodes: readonly number[];
  private readonly spawn?: SpawnFn;

  constructor(params: {
    definition: SolverDefinition<CommandOptions>;
    options: CommandOptions;
    context: SolverContext;
    command: string;
    planFormat: string;
    unsolvableExitCodes: number[];
    spawn?: SpawnFn;
  }) {
    super(params);
    this.command = params.command;
    this.planFormat = params.planFormat;
    this.unsolvableExitCodes = params.unsolvableExitCodes;
    this.spawn = params.spawn;
  }

  protected override defaultTimeoutMs(): number | undefined {
    return this.options.timeoutMs;
  }

  protected async execute(invocation: SolveInvocation, signal: AbortSignal): Promise<SolveOutcome> {
    const startedAt = this.clock.now();
    const { problem } = invocation;
    const rendered = renderCommandTemplate(this.command, {
      instance: problem.locator,
      problem: problem.name,
      domain: problem.document.domain ?? "",
    });
    const commandLine = formatCommand(rendered);
    this.log.debug?.({ id: invocation.id, command: commandLine }, `${LOG_PREFIX}:execute - Launching`);

    const result = await runProcess({
      command: rendered.command,
      args: rendered.args,
      cwd: this.options.cwd,
      env: this.options.env ? { ...process.env, ...this.options.env } : undefined,
      signal,
      spawn: this.spawn,
    });
    const meta = finishMeta({ clock: this.clock, startedAt, solver: this.name() });

    if (result.kind === "spawn-error") {
      return failed({
        code: "TRANSPORT_ERROR",
        message: `${LOG_PREFIX}:execute - Could not start ${rendered.command}: ${result.message}`,
        details: { command: commandLine, errorCode: result.code },
        meta,
      });
    }

    if (signal.aborted) {
      const reason: unknown = signal.reason;
      const interrupted =
        reason instanceof PlanningError && isSolveFailureCode(reason.code)
          ? { code: reason.code, message: reason.message, retryable: reason.retryable }
          : { code: "CANCELLED" as const, message: `${LOG_PREFIX}:execute - Solve was cancelled`, retryable: false };
      return failed({ ...interrupted, details: { command: commandLine, signal: result.signal }, meta });
    }

    if (result.exitCode === 0) {
      return planFound({ format: this.planFormat, content: result.stdout.trim() }, meta);
    }
    if (result.exitCode !== null && this.unsolvableExitCodes.includes(result.exitCode)) {
      return unsolvable(meta);
    }
    return failed({
      code: "SOLVE_FAILURE",
      message:
        result.exitCode === null
          ? `${LOG_PREFIX}:execute - ${rendered.command} was killed by ${result.signal ?? "a signal"}`
          : `${LOG_PREFIX}:execute - ${rendered.command} exited with code ${result.exitCode}`,
      details: {
        command: commandLine,
        exitCode: result.exitCode,
        signal: result.signal,
        stderr: result.stderr.slice(-STDERR_TAIL_CHARS),
      },
      meta,
    });
  }
}
