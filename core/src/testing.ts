/**
 * In-process stand-ins for tests: a scriptable child process and a problem
 * factory. Exported as `@planwire/core/testing`.
 */

import { EventEmitter } from "node:events";
import { PassThrough } from "node:stream";
import type { CapabilityDescriptor } from "./capabilities.js";
import type { Plan } from "./outcome.js";
import { type Problem, decodeProblem } from "./problem.js";
import type { ChildProcessLike } from "./process.js";

export class FakeChild extends EventEmitter implements ChildProcessLike {
  stdout = new PassThrough();
  stderr = new PassThrough();
  readonly signals: NodeJS.Signals[] = [];

  kill(signal: NodeJS.Signals = "SIGTERM"): boolean {
    this.signals.push(signal);
    setImmediate(() => this.emit("close", null, signal));
    return true;
  }

  exitLater(code: number, output: { stdout?: string; stderr?: string } = {}): void {
    setImmediate(() => {
      if (output.stdout) this.stdout.emit("data", Buffer.from(output.stdout));
      if (output.stderr) this.stderr.emit("data", Buffer.from(output.stderr));
      this.emit("close", code, null);
    });
  }

  failLater(message: string, code = "ENOENT"): void {
    setImmediate(() => this.emit("error", Object.assign(new Error(message), { code })));
  }
}

/**
 * A problem requiring `kind`, decoded the same way problem files are.
 * `referencePlan` is omitted when undefined.
 */
export function problemOf(
  kind: CapabilityDescriptor,
  params: { name?: string; locator?: string; referencePlan?: Plan | null } = {}
): Problem {
  const name = params.name ?? "sample-problem";
  const document = {
    name,
    kind: kind.toRecord(),
    ...(params.referencePlan === undefined ? {} : { referencePlan: params.referencePlan }),
  };
  return decodeProblem(JSON.stringify(document), params.locator ?? `problems/${name}.json`);
}
