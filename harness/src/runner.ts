/**
 * Runs one corpus instance: render the command, launch it once, wait for it
 * and read the OUTCOME line from its stdout.
 */

import {
  type SolveOutcome,
  type SpawnFn,
  formatCommand,
  launchCommand,
  parseOutcomeLine,
  renderCommandTemplate,
  runProcess,
} from "@planwire/core";

export interface InstanceResult {
  instance: string;
  locator: string;
  /** Rendered command line */
  command: string;
  passed: boolean;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  /** Set when the process could not be started */
  spawnError?: string;
  /** Parsed OUTCOME line, when the process printed one */
  outcome?: SolveOutcome;
  stderr: string;
  durationMs: number;
}

export interface RenderedInstanceCommand {
  command: string;
  args: string[];
  display: string;
}

/**
 * Render the command template for one instance. A TypeScript executable is
 * launched through tsx on the current Node binary.
 */
export function renderInstanceCommand(params: {
  template: string;
  executable: string;
  address: string;
  locator: string;
}): RenderedInstanceCommand {
  const rendered = renderCommandTemplate(params.template, {
    executable: params.executable,
    address: params.address,
    instance: params.locator,
  });
  const launch = launchCommand(rendered.command);
  return { command: launch.command, args: [...launch.prefixArgs, ...rendered.args], display: formatCommand(rendered) };
}

export async function runInstance(params: {
  instance: string;
  locator: string;
  command: RenderedInstanceCommand;
  cwd?: string;
  spawn?: SpawnFn;
  clock?: { now(): number };
}): Promise<InstanceResult> {
  const clock = params.clock ?? { now: () => Date.now() };
  const startedAt = clock.now();
  const result = await runProcess({
    command: params.command.command,
    args: params.command.args,
    cwd: params.cwd,
    spawn: params.spawn,
  });
  const durationMs = clock.now() - startedAt;
  const base = { instance: params.instance, locator: params.locator, command: params.command.display, durationMs };

  if (result.kind === "spawn-error") {
    return { ...base, passed: false, exitCode: null, signal: null, spawnError: result.message, stderr: "" };
  }
  return {
    ...base,
    passed: result.exitCode === 0,
    exitCode: result.exitCode,
    signal: result.signal,
    outcome: parseOutcomeLine(result.stdout),
    stderr: result.stderr,
  };
}
