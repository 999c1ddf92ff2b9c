/**
 * planwire-server command line.
 *
 *   planwire-server --address <host:port> [--file-path <locator>] [--config <path>]
 *
 * With --file-path the problem is solved once and the process exits with the
 * outcome's code; otherwise the endpoint serves until shutdown.
 */

import { parseArgs } from "node:util";
import {
  type Logger,
  type SpawnFn,
  ConfigurationError,
  ExitCode,
  errorMessage,
  resolveLogger,
} from "@planwire/core";
import { type ServerConfig, loadServerConfig } from "./config.js";
import { type EndpointConnector, SolverEndpoint } from "./endpoint.js";
import { runOneShot } from "./oneshot.js";
import { SolverHost } from "./solver-host.js";

const LOG_PREFIX = "planwire-server:cli";

export const USAGE = `Usage: planwire-server --address <host:port> [--file-path <problem>] [--config <path>]
       [--solver <name>] [--timeout-ms <ms>]`;

export interface ServerCliArgs {
  address?: string;
  filePath?: string;
  configPath?: string;
  solver?: string;
  timeoutMs?: number;
  help: boolean;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

/**
 * @throws UsageError on unknown flags, positionals or a bad --timeout-ms
 */
export function parseServerArgs(argv: string[]): ServerCliArgs {
  const values = parseFlags(argv);

  let timeoutMs: number | undefined;
  if (values["timeout-ms"] !== undefined) {
    timeoutMs = Number(values["timeout-ms"]);
    if (!Number.isInteger(timeoutMs) || timeoutMs < 1) {
      throw new UsageError(`--timeout-ms must be a positive integer, got "${values["timeout-ms"]}"`);
    }
  }

  return {
    address: values.address,
    filePath: values["file-path"],
    configPath: values.config,
    solver: values.solver,
    timeoutMs,
    help: values.help ?? false,
  };
}

function parseFlags(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      strict: true,
      allowPositionals: false,
      options: {
        address: { type: "string" },
        "file-path": { type: "string" },
        config: { type: "string" },
        solver: { type: "string" },
        "timeout-ms": { type: "string" },
        help: { type: "boolean", short: "h" },
      },
    }).values;
  } catch (err) {
    throw new UsageError(errorMessage(err));
  }
}

export interface ServerCliDeps {
  env?: NodeJS.ProcessEnv;
  loggerFactory?: Logger;
  connect?: EndpointConnector;
  spawn?: SpawnFn;
  /** OUTCOME line sink for one-shot mode */
  writeOutcome?: (line: string) => void;
  /** Usage and error text */
  writeError?: (text: string) => void;
  /** Resolves when the serving endpoint should stop */
  shutdownSignal?: () => Promise<string>;
}

/**
 * Run the CLI and resolve with the process exit code.
 */
export async function runServerCli(argv: string[], deps: ServerCliDeps = {}): Promise<number> {
  const log = resolveLogger(deps.loggerFactory, LOG_PREFIX);
  const writeError = deps.writeError ?? ((text: string) => process.stderr.write(`${text}\n`));

  let args: ServerCliArgs;
  try {
    args = parseServerArgs(argv);
  } catch (err) {
    writeError(`${errorMessage(err)}\n${USAGE}`);
    return ExitCode.USAGE;
  }
  if (args.help) {
    writeError(USAGE);
    return ExitCode.PLAN_FOUND;
  }

  let host: SolverHost;
  let config: ServerConfig;
  try {
    config = loadServerConfig({
      overrides: { address: args.address, configPath: args.configPath },
      env: deps.env,
      log,
    });
    host = SolverHost.fromConfig(config.solvers, { loggerFactory: deps.loggerFactory, spawn: deps.spawn });
  } catch (err) {
    if (err instanceof ConfigurationError) {
      writeError(err.message);
      return ExitCode.CONFIGURATION;
    }
    throw err;
  }

  if (args.filePath !== undefined) {
    try {
      const result = await runOneShot({
        host,
        locator: args.filePath,
        solver: args.solver,
        timeoutMs: args.timeoutMs,
        write: deps.writeOutcome,
        loggerFactory: deps.loggerFactory,
      });
      return result.exitCode;
    } catch (err) {
      if (err instanceof ConfigurationError) {
        writeError(err.message);
        return ExitCode.CONFIGURATION;
      }
      throw err;
    }
  }

  const endpoint = new SolverEndpoint({ config, host, connect: deps.connect, loggerFactory: deps.loggerFactory });
  try {
    await endpoint.start();
  } catch (err) {
    if (err instanceof ConfigurationError) {
      writeError(err.message);
      return ExitCode.CONFIGURATION;
    }
    throw err;
  }
  log.info?.({ address: config.address, solvers: host.describe().map((s) => s.name) }, `${LOG_PREFIX}:run - Serving`);

  const signal = await (deps.shutdownSignal ?? waitForTermination)();
  log.info?.({ signal }, `${LOG_PREFIX}:run - Shutting down`);
  await endpoint.stop();
  return ExitCode.PLAN_FOUND;
}

function waitForTermination(): Promise<string> {
  return new Promise((resolve) => {
    process.once("SIGINT", () => resolve("SIGINT"));
    process.once("SIGTERM", () => resolve("SIGTERM"));
  });
}
