/**
 * Unit tests for the planwire-validate command line.
 */

import { describe, it, expect, vi } from "vitest";
import { type SpawnFn, formatOutcomeLine } from "@planwire/core";
import { FakeChild } from "@planwire/core/testing";
import { USAGE, runHarnessCli } from "./cli.js";

const readFile = async () =>
  JSON.stringify({ problemsDir: "problems", extension: "json", instances: ["basic", "matchcellar"] });

const planLine = formatOutcomeLine({
  status: "plan",
  plan: { format: "sequential", content: "a" },
  meta: { startedAtUnixMs: 0, endedAtUnixMs: 1, durationMs: 1 },
});

function spawnExiting(code: number) {
  return vi.fn<SpawnFn>(() => {
    const child = new FakeChild();
    child.exitLater(code, { stdout: code === 0 ? planLine : "" });
    return child;
  });
}

async function run(argv: string[], spawn: SpawnFn) {
  const lines: string[] = [];
  const code = await runHarnessCli(argv, { env: {}, cwd: "/work", spawn, readFile, write: (line) => lines.push(line) });
  return { code, lines };
}

describe("runHarnessCli", () => {
  it("should exit 0 when every instance is solved", async () => {
    const { code, lines } = await run(["--executable", "bin/planner"], spawnExiting(0));

    expect(code).toBe(0);
    expect(lines.at(-1)).toBe("All 2 instance(s) solved");
  });

  it("should exit 1 and name the failing instance and command", async () => {
    const spawn = vi.fn<SpawnFn>((_command, args) => {
      const child = new FakeChild();
      if (args.some((arg) => arg.endsWith("matchcellar.json"))) child.exitLater(1);
      else child.exitLater(0, { stdout: planLine });
      return child;
    });
    const { code, lines } = await run(["--executable", "bin/planner"], spawn);

    expect(code).toBe(1);
    expect(spawn).toHaveBeenCalledTimes(2);
    expect(lines.at(-1)).toBe(
      "Validation failed: matchcellar (/work/bin/planner --address 0.0.0.0:2222 --file-path /work/harness/problems/matchcellar.json): exited with code 1"
    );
  });

  it("should exit 1 when the build fails", async () => {
    const { code, lines } = await run(["--build-command", "make"], spawnExiting(2));

    expect(code).toBe(1);
    expect(lines.at(-1)).toBe("Validation failed: Build exited with 2");
  });

  it("should print usage for --help", async () => {
    const { code, lines } = await run(["--help"], spawnExiting(0));

    expect(code).toBe(0);
    expect(lines).toEqual([USAGE]);
  });

  it("should exit 1 with usage on an unknown flag", async () => {
    const spawn = spawnExiting(0);
    const { code, lines } = await run(["--instances", "3"], spawn);

    expect(code).toBe(1);
    expect(lines[0]).toContain(USAGE);
    expect(spawn).not.toHaveBeenCalled();
  });

  it("should exit 1 on a bad address", async () => {
    const { code, lines } = await run(["--executable", "bin/planner", "--address", "localhost"], spawnExiting(0));

    expect(code).toBe(1);
    expect(lines).toEqual(['planwire-core:address:parseAddress - Expected host:port, got "localhost"']);
  });
});
