#!/usr/bin/env -S node --import tsx
/**
 * planwire-server process: loads env, builds the logger and runs the CLI.
 * The exit status is the CLI's exit code.
 */

import "dotenv/config";
import { createNodeJSLogger } from "@planwire/core";
import { runServerCli } from "./cli.js";

const SERVICE_NAME = process.env.SERVICE_NAME ?? "planwire-server";

async function main(): Promise<void> {
  const loggerFactory = createNodeJSLogger(SERVICE_NAME);
  process.exitCode = await runServerCli(process.argv.slice(2), { loggerFactory });
}

main().catch((err) => {
  console.error(`${SERVICE_NAME}:main - Fatal:`, err);
  process.exit(1);
});
