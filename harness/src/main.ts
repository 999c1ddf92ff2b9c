#!/usr/bin/env -S node --import tsx
/**
 * planwire-validate process: validates a solver executable against the corpus.
 */

import "dotenv/config";
import { createNodeJSLogger } from "@planwire/core";
import { runHarnessCli } from "./cli.js";

const SERVICE_NAME = "planwire-validate";

async function main(): Promise<void> {
  const loggerFactory = createNodeJSLogger(SERVICE_NAME);
  process.exitCode = await runHarnessCli(process.argv.slice(2), { loggerFactory });
}

main().catch((err) => {
  console.error(`${SERVICE_NAME}:main - Fatal:`, err);
  process.exit(1);
});
