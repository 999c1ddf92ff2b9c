/**
 * ValidationHarness: drives a solver executable over the corpus, in order,
 * one process per instance, and stops at the first instance that does not
 * exit 0.
 */

import {
  type Logger,
  type SpawnFn,
  resolveLogger,
  summarizeOutcome,
} from "@planwire/core";
import { type BuildResult, runBuild } from "./builder.js";
import type { HarnessConfig } from "./config.js";
import { type Corpus, loadCorpus, locatorFor } from "./corpus.js";
import { type InstanceResult, renderInstanceCommand, runInstance } from "./runner.js";

const LOG_PREFIX = "planwire-harness:harness";

export type HarnessFailure =
  | {
      stage: "build";
      command: string;
      exitCode: number | null;
      message: string;
    }
  | {
      stage: "instance";
      instance: string;
      locator: string;
      command: string;
      exitCode: number | null;
      message: string;
    };

export interface HarnessReport {
  ok: boolean;
  /** Executable that was (or would have been) validated */
  executable: string;
  build?: BuildResult;
  /** One entry per instance that ran, in corpus order */
  results: InstanceResult[];
  failure?: HarnessFailure;
}

export interface ValidationHarnessParams {
  config: HarnessConfig;
  spawn?: SpawnFn;
  readFile?: (path: string) => Promise<string>;
  /** Human-readable progress lines */
  progress?: (line: string) => void;
  loggerFactory?: Logger;
  clock?: { now(): number };
}

export class ValidationHarness {
  private readonly config: HarnessConfig;
  private readonly spawn?: SpawnFn;
  private readonly readFile?: (path: string) => Promise<string>;
  private readonly progress: (line: string) => void;
  private readonly log: Logger;
  private readonly clock?: { now(): number };

  constructor(params: ValidationHarnessParams) {
    this.config = params.config;
    this.spawn = params.spawn;
    this.readFile = params.readFile;
    this.progress = params.progress ?? (() => {});
    this.log = resolveLogger(params.loggerFactory, LOG_PREFIX);
    this.clock = params.clock;
  }

  /**
   * Build when no executable was given, then run every instance in order.
   *
   * @throws ConfigurationError when the corpus cannot be loaded
   */
  async run(): Promise<HarnessReport> {
    const corpus = await loadCorpus(this.config.corpusPath, { readFile: this.readFile });

    let build: BuildResult | undefined;
    let executable = this.config.executable;
    if (executable === undefined) {
      executable = this.config.build.executable;
      this.progress(`Building: ${this.config.build.command}`);
      build = await runBuild({ command: this.config.build.command, cwd: this.config.cwd, spawn: this.spawn });
      if (!build.ok) {
        this.progress(build.message);
        this.log.error?.({ command: build.command, exitCode: build.exitCode }, `${LOG_PREFIX}:run - Build failed`);
        return {
          ok: false,
          executable,
          build,
          results: [],
          failure: { stage: "build", command: build.command, exitCode: build.exitCode, message: build.message },
        };
      }
    }

    return this.runCorpus({ corpus, executable, build });
  }

  private async runCorpus(args: { corpus: Corpus; executable: string; build?: BuildResult }): Promise<HarnessReport> {
    const results: InstanceResult[] = [];

    for (const instance of args.corpus.instances) {
      const locator = locatorFor(args.corpus, instance);
      const command = renderInstanceCommand({
        template: this.config.commandTemplate,
        executable: args.executable,
        address: this.config.address,
        locator,
      });
      this.progress(`Solving instance: ${locator}`);
      this.progress(`Command: ${command.display}`);

      const result = await runInstance({
        instance,
        locator,
        command,
        cwd: this.config.cwd,
        spawn: this.spawn,
        clock: this.clock,
      });
      results.push(result);

      if (!result.passed) {
        const message = describeFailure(result);
        const failure: HarnessFailure = {
          stage: "instance",
          instance,
          locator,
          command: command.display,
          exitCode: result.exitCode,
          message,
        };
        this.progress(`Solver did not return expected result: ${formatFailure(failure)}`);
        this.log.error?.(
          { instance, locator, command: command.display, exitCode: result.exitCode },
          `${LOG_PREFIX}:runCorpus - ${message}`
        );
        return { ok: false, executable: args.executable, build: args.build, results, failure };
      }
    }

    this.log.info?.({ instances: results.length }, `${LOG_PREFIX}:runCorpus - All instances solved`);
    return { ok: true, executable: args.executable, build: args.build, results };
  }
}

/** One line naming the failing instance, the command issued and what was observed. */
export function formatFailure(failure: HarnessFailure): string {
  if (failure.stage === "build") return failure.message;
  return `${failure.instance} (${failure.command}): ${failure.message}`;
}

export function describeFailure(result: InstanceResult): string {
  if (result.spawnError !== undefined) return `could not start: ${result.spawnError}`;
  const status =
    result.exitCode === null ? `killed by ${result.signal ?? "a signal"}` : `exited with code ${result.exitCode}`;
  return result.outcome ? `${status} (${summarizeOutcome(result.outcome)})` : status;
}
