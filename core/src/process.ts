/**
 * Child-process execution shared by the command solver and the harness.
 *
 * A run ends in exactly one of two ways: the process started and exited
 * (with a code or a signal), or it could not be started at all. The two are
 * never folded together.
 */

import { spawn } from "node:child_process";
import type { Readable } from "node:stream";
import { errorMessage } from "./errors.js";

// ── Types ───────────────────────────────────────────────────────────

/** The parts of a ChildProcess a run needs. */
export interface ChildProcessLike {
  stdout: Readable | null;
  stderr: Readable | null;
  on(event: "error", listener: (err: Error) => void): unknown;
  on(event: "close", listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  kill(signal?: NodeJS.Signals): boolean;
}

export type SpawnFn = (
  command: string,
  args: string[],
  options: { cwd?: string; env?: NodeJS.ProcessEnv }
) => ChildProcessLike;

export type ProcessResult =
  | {
      kind: "exited";
      /** null when the process was terminated by a signal */
      exitCode: number | null;
      signal: NodeJS.Signals | null;
      stdout: string;
      stderr: string;
    }
  | {
      kind: "spawn-error";
      message: string;
      code?: string;
    };

export const defaultSpawn: SpawnFn = (command, args, options) =>
  spawn(command, args, { cwd: options.cwd, env: options.env, stdio: ["ignore", "pipe", "pipe"] });

// ── Run ─────────────────────────────────────────────────────────────

/**
 * Run a command to completion. Aborting `signal` kills the process with
 * SIGTERM; the result then reports the signal.
 */
export function runProcess(params: {
  command: string;
  args: string[];
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  signal?: AbortSignal;
  spawn?: SpawnFn;
}): Promise<ProcessResult> {
  const spawnFn = params.spawn ?? defaultSpawn;

  return new Promise<ProcessResult>((resolve) => {
    let child: ChildProcessLike;
    try {
      child = spawnFn(params.command, params.args, { cwd: params.cwd, env: params.env });
    } catch (err) {
      resolve({ kind: "spawn-error", message: errorMessage(err), code: errorCode(err) });
      return;
    }

    // decoded on close so multi-byte characters split across chunks survive
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    child.stdout?.on("data", (chunk: Buffer | string) => stdout.push(toBuffer(chunk)));
    child.stderr?.on("data", (chunk: Buffer | string) => stderr.push(toBuffer(chunk)));

    let settled = false;
    const onAbort = (): void => {
      child.kill("SIGTERM");
    };
    const finish = (result: ProcessResult): void => {
      if (settled) return;
      settled = true;
      params.signal?.removeEventListener("abort", onAbort);
      resolve(result);
    };

    child.on("error", (err) => {
      finish({ kind: "spawn-error", message: err.message, code: errorCode(err) });
    });
    child.on("close", (exitCode, exitSignal) => {
      finish({
        kind: "exited",
        exitCode,
        signal: exitSignal,
        stdout: Buffer.concat(stdout).toString("utf8"),
        stderr: Buffer.concat(stderr).toString("utf8"),
      });
    });

    if (params.signal?.aborted) {
      onAbort();
    } else {
      params.signal?.addEventListener("abort", onAbort, { once: true });
    }
  });
}

function toBuffer(chunk: Buffer | string): Buffer {
  return typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk;
}

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") return err.code;
  return undefined;
}

/**
 * How to launch an executable. TypeScript entry points run through tsx on
 * the current Node binary; anything else is executed directly.
 */
export function launchCommand(executable: string): { command: string; prefixArgs: string[] } {
  if (/\.[cm]?ts$/.test(executable)) {
    return { command: process.execPath, prefixArgs: ["--import", "tsx", executable] };
  }
  return { command: executable, prefixArgs: [] };
}
