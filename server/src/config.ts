/**
 * Solver endpoint configuration: env, optional JSON config file, CLI flags.
 *
 * Env: SOLVER_ADDRESS, SERVICE_NAME, CONFIG_PATH, SUBJECT_PREFIX,
 * CONCURRENT_WORKERS. Flags override env; the file supplies the solvers.
 */

import { existsSync, readFileSync } from "node:fs";
import { z } from "zod";
import {
  type Logger,
  CapabilityRecordSchema,
  ConfigurationError,
  DEFAULT_SUBJECT_PREFIX,
  errorMessage,
  parseAddress,
  silentLogger,
} from "@planwire/core";
import { CommandSolverConfigSchema } from "@planwire/client";

const LOG_PREFIX = "planwire-server:config";

// ── File schema ─────────────────────────────────────────────────────

export const ReplayEntrySchema = z
  .object({
    type: z.literal("replay"),
    name: z.string().min(1).optional(),
    capabilities: CapabilityRecordSchema.optional(),
    options: z.unknown().optional(),
  })
  .strict();

export const CommandEntrySchema = CommandSolverConfigSchema.extend({
  type: z.literal("command"),
  /** Instance options, validated by the solver's own schema */
  options: z.unknown().optional(),
});

export const SolverEntrySchema = z.discriminatedUnion("type", [ReplayEntrySchema, CommandEntrySchema]);

export type SolverEntry = z.infer<typeof SolverEntrySchema>;

export const ServerConfigFileSchema = z
  .object({
    connectionName: z.string().min(1).optional(),
    subjectPrefix: z.string().min(1).optional(),
    concurrentWorkers: z.number().int().positive().optional(),
    solvers: z.array(SolverEntrySchema).optional(),
  })
  .strict();

export type ServerConfigFile = z.infer<typeof ServerConfigFileSchema>;

// ── Resolved config ─────────────────────────────────────────────────

export interface ServerConfig {
  /** host:port the endpoint serves on */
  address: string;
  connectionName: string;
  subjectPrefix: string;
  /** Subscriptions per subject sharing one queue group */
  concurrentWorkers: number;
  /** Never empty: defaults to the replay solver */
  solvers: SolverEntry[];
  configPath?: string;
}

export const DEFAULT_SOLVERS: SolverEntry[] = [{ type: "replay" }];

export interface ConfigOverrides {
  address?: string;
  configPath?: string;
}

/**
 * Resolve the endpoint configuration.
 *
 * @throws ConfigurationError on a missing address, an unreadable or invalid
 *   config file, or a bad CONCURRENT_WORKERS value
 */
export function loadServerConfig(
  params: {
    overrides?: ConfigOverrides;
    env?: NodeJS.ProcessEnv;
    readFile?: (path: string) => string;
    log?: Logger;
  } = {}
): ServerConfig {
  const env = params.env ?? process.env;
  const log = params.log ?? silentLogger;

  const address = params.overrides?.address ?? env.SOLVER_ADDRESS;
  if (!address) {
    throw new ConfigurationError({
      message: `${LOG_PREFIX}:loadServerConfig - No address: pass --address or set SOLVER_ADDRESS`,
    });
  }
  parseAddress(address);

  const configPath = params.overrides?.configPath ?? env.CONFIG_PATH;
  const file = configPath ? readConfigFile({ path: configPath, readFile: params.readFile }) : {};
  if (configPath) {
    log.info?.(
      { configPath, solverCount: file.solvers?.length ?? 0 },
      `${LOG_PREFIX}:loadServerConfig - Loaded config from file`
    );
  }

  const concurrentWorkers = env.CONCURRENT_WORKERS
    ? parsePositiveInt("CONCURRENT_WORKERS", env.CONCURRENT_WORKERS)
    : (file.concurrentWorkers ?? 1);

  return {
    address,
    connectionName: env.SERVICE_NAME ?? file.connectionName ?? "planwire-server",
    subjectPrefix: env.SUBJECT_PREFIX ?? file.subjectPrefix ?? DEFAULT_SUBJECT_PREFIX,
    concurrentWorkers,
    solvers: file.solvers && file.solvers.length > 0 ? file.solvers : DEFAULT_SOLVERS,
    configPath,
  };
}

function readConfigFile(params: { path: string; readFile?: (path: string) => string }): ServerConfigFile {
  const read = params.readFile ?? defaultReadFile;
  let raw: unknown;
  try {
    raw = JSON.parse(read(params.path));
  } catch (err) {
    throw new ConfigurationError({
      message: `${LOG_PREFIX}:readConfigFile - Cannot read config file ${params.path}: ${errorMessage(err)}`,
      details: { configPath: params.path },
      cause: err,
    });
  }
  const parsed = ServerConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError({
      message: `${LOG_PREFIX}:readConfigFile - Invalid config file ${params.path}`,
      details: { configPath: params.path, errors: parsed.error.flatten() },
    });
  }
  return parsed.data;
}

function defaultReadFile(path: string): string {
  if (!existsSync(path)) throw new Error(`${path} does not exist`);
  return readFileSync(path, "utf-8");
}

function parsePositiveInt(name: string, value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new ConfigurationError({
      message: `${LOG_PREFIX}:loadServerConfig - ${name} must be a positive integer, got "${value}"`,
    });
  }
  return n;
}
