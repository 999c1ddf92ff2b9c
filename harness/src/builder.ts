import { type ProcessResult, type SpawnFn, ConfigurationError, runProcess } from "@planwire/core";

const LOG_PREFIX = "planwire-harness:builder";

export interface BuildResult {
  command: string;
  ok: boolean;
  /** null when the process was killed or never started */
  exitCode: number | null;
  message: string;
  output: string;
}

/**
 * Run the build command once. Any non-zero status, or a command that cannot
 * be started, is a failed build.
 */
export async function runBuild(params: { command: string; cwd: string; spawn?: SpawnFn }): Promise<BuildResult> {
  const [command, ...args] = params.command.trim().split(/\s+/).filter((part) => part.length > 0);
  if (!command) {
    throw new ConfigurationError({ message: `${LOG_PREFIX}:runBuild - Empty build command` });
  }
  const result: ProcessResult = await runProcess({ command, args, cwd: params.cwd, spawn: params.spawn });

  if (result.kind === "spawn-error") {
    return {
      command: params.command,
      ok: false,
      exitCode: null,
      message: `Build command could not be started: ${result.message}`,
      output: "",
    };
  }
  const ok = result.exitCode === 0;
  return {
    command: params.command,
    ok,
    exitCode: result.exitCode,
    message: ok ? "Build succeeded" : `Build exited with ${result.exitCode ?? result.signal ?? "unknown status"}`,
    output: `${result.stdout}${result.stderr}`,
  };
}
