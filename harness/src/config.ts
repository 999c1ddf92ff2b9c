/**
 * Harness configuration. Env: HARNESS_EXECUTABLE, HARNESS_ADDRESS,
 * HARNESS_BUILD_COMMAND, HARNESS_CORPUS; flags override env.
 */

import { resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { parseAddress, validateCommandTemplate } from "@planwire/core";

/** Repository root, two levels above this file */
export const REPO_ROOT = fileURLToPath(new URL("../../", import.meta.url));

export const DEFAULT_ADDRESS = "0.0.0.0:2222";
export const DEFAULT_COMMAND_TEMPLATE = "{executable} --address {address} --file-path {instance}";
export const DEFAULT_BUILD_COMMAND = "npm run typecheck";
/** Built-in endpoint entry point, run through tsx */
export const DEFAULT_EXECUTABLE = "server/src/main.ts";
export const DEFAULT_CORPUS = "harness/corpus.json";

export const HARNESS_PLACEHOLDERS = ["executable", "address", "instance"] as const;

export interface HarnessConfig {
  /** Solver executable; when absent the build step runs and the built-in endpoint is used */
  executable?: string;
  address: string;
  commandTemplate: string;
  /** Path of the corpus file */
  corpusPath: string;
  build: {
    command: string;
    /** Executable validated after a successful build */
    executable: string;
  };
  /** Working directory for the build and relative paths */
  cwd: string;
}

export interface HarnessOverrides {
  executable?: string;
  address?: string;
  commandTemplate?: string;
  corpusPath?: string;
  buildCommand?: string;
}

/**
 * @throws ConfigurationError on a bad address or command template
 */
export function loadHarnessConfig(
  params: { overrides?: HarnessOverrides; env?: NodeJS.ProcessEnv; cwd?: string } = {}
): HarnessConfig {
  const env = params.env ?? process.env;
  const cwd = params.cwd ?? REPO_ROOT;
  const overrides = params.overrides ?? {};

  const address = overrides.address ?? env.HARNESS_ADDRESS ?? DEFAULT_ADDRESS;
  parseAddress(address);

  const commandTemplate = overrides.commandTemplate ?? DEFAULT_COMMAND_TEMPLATE;
  validateCommandTemplate(commandTemplate, { allowed: HARNESS_PLACEHOLDERS, required: ["executable", "instance"] });

  const executable = overrides.executable ?? env.HARNESS_EXECUTABLE;
  return {
    executable: executable ? resolve(cwd, executable) : undefined,
    address,
    commandTemplate,
    corpusPath: resolve(cwd, overrides.corpusPath ?? env.HARNESS_CORPUS ?? DEFAULT_CORPUS),
    build: {
      command: overrides.buildCommand ?? env.HARNESS_BUILD_COMMAND ?? DEFAULT_BUILD_COMMAND,
      executable: resolve(cwd, DEFAULT_EXECUTABLE),
    },
    cwd,
  };
}
