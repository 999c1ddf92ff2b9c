/**
 * planwire-validate command line.
 *
 *   planwire-validate [--executable <path>] [--address <host:port>]
 *                     [--corpus <path>] [--build-command <cmd>] [--command <template>]
 */

import { parseArgs } from "node:util";
import { type Logger, type SpawnFn, ConfigurationError, errorMessage } from "@planwire/core";
import { type HarnessOverrides, loadHarnessConfig } from "./config.js";
import { ValidationHarness, formatFailure } from "./harness.js";

export const USAGE = `Usage: planwire-validate [--executable <path>] [--address <host:port>] [--corpus <path>]
       [--build-command <cmd>] [--command <template>]`;

function parseFlags(argv: string[]) {
  return parseArgs({
    args: argv,
    strict: true,
    allowPositionals: false,
    options: {
      executable: { type: "string" },
      address: { type: "string" },
      corpus: { type: "string" },
      "build-command": { type: "string" },
      command: { type: "string" },
      help: { type: "boolean", short: "h" },
    },
  }).values;
}

export interface HarnessCliDeps {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  spawn?: SpawnFn;
  readFile?: (path: string) => Promise<string>;
  loggerFactory?: Logger;
  /** Progress and result lines */
  write?: (line: string) => void;
}

/**
 * Run the harness; resolves with 0 when every instance solved, 1 otherwise.
 */
export async function runHarnessCli(argv: string[], deps: HarnessCliDeps = {}): Promise<number> {
  const write = deps.write ?? ((line: string) => process.stdout.write(`${line}\n`));

  let overrides: HarnessOverrides;
  try {
    const values = parseFlags(argv);
    if (values.help) {
      write(USAGE);
      return 0;
    }
    overrides = {
      executable: values.executable,
      address: values.address,
      corpusPath: values.corpus,
      buildCommand: values["build-command"],
      commandTemplate: values.command,
    };
  } catch (err) {
    write(`${errorMessage(err)}\n${USAGE}`);
    return 1;
  }

  try {
    const config = loadHarnessConfig({ overrides, env: deps.env, cwd: deps.cwd });
    const harness = new ValidationHarness({
      config,
      spawn: deps.spawn,
      readFile: deps.readFile,
      progress: write,
      loggerFactory: deps.loggerFactory,
    });
    const report = await harness.run();
    write(
      report.ok
        ? `All ${report.results.length} instance(s) solved`
        : `Validation failed: ${report.failure ? formatFailure(report.failure) : "unknown failure"}`
    );
    return report.ok ? 0 : 1;
  } catch (err) {
    if (err instanceof ConfigurationError) {
      write(err.message);
      return 1;
    }
    throw err;
  }
}
