/**
 * Unit tests for the planwire-server command line.
 */

import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterAll, beforeAll, describe, it, expect, vi } from "vitest";
import { parseOutcomeLine } from "@planwire/core";
import { USAGE, UsageError, parseServerArgs, runServerCli } from "./cli.js";
import { FakeEndpointConnection } from "./testing.js";

let dir = "";

function problemFile(name: string, content: unknown): string {
  const path = join(dir, name);
  writeFileSync(path, JSON.stringify(content));
  return path;
}

beforeAll(() => {
  dir = mkdtempSync(join(tmpdir(), "planwire-cli-"));
});

afterAll(() => {
  rmSync(dir, { recursive: true, force: true });
});

function createDeps() {
  return {
    env: {},
    writeOutcome: vi.fn<(line: string) => void>(),
    writeError: vi.fn<(text: string) => void>(),
  };
}

describe("parseServerArgs", () => {
  it("should read every flag", () => {
    expect(
      parseServerArgs([
        "--address",
        "0.0.0.0:2222",
        "--file-path",
        "p.json",
        "--config",
        "c.json",
        "--solver",
        "replay",
        "--timeout-ms",
        "500",
      ])
    ).toEqual({
      address: "0.0.0.0:2222",
      filePath: "p.json",
      configPath: "c.json",
      solver: "replay",
      timeoutMs: 500,
      help: false,
    });
  });

  it.each([[["--verbose"]], [["extra"]], [["--timeout-ms", "soon"]], [["--timeout-ms", "0"]]])(
    "should reject %j",
    (argv) => {
      expect(() => parseServerArgs(argv)).toThrow(UsageError);
    }
  );
});

describe("runServerCli", () => {
  it("should exit 64 with usage on a bad flag", async () => {
    const deps = createDeps();

    expect(await runServerCli(["--verbose"], deps)).toBe(64);
    expect(deps.writeError.mock.calls[0]?.[0]).toContain(USAGE);
  });

  it("should print usage and exit 0 for --help", async () => {
    const deps = createDeps();

    expect(await runServerCli(["-h"], deps)).toBe(0);
    expect(deps.writeError).toHaveBeenCalledWith(USAGE);
  });

  it("should exit 78 without an address", async () => {
    const deps = createDeps();

    expect(await runServerCli([], deps)).toBe(78);
    expect(deps.writeError).toHaveBeenCalledWith(
      "planwire-server:config:loadServerConfig - No address: pass --address or set SOLVER_ADDRESS"
    );
  });

  it("should exit 78 for unrecognized solver options in the config file", async () => {
    const deps = createDeps();
    const configPath = problemFile("bad-options.json", { solvers: [{ type: "replay", options: { depth: 3 } }] });
    const problem = problemFile("p.json", { name: "p", kind: {}, referencePlan: null });

    const code = await runServerCli(["--address", "0.0.0.0:2222", "--config", configPath, "--file-path", problem], deps);

    expect(code).toBe(78);
    expect(deps.writeOutcome).not.toHaveBeenCalled();
  });

  describe("one-shot", () => {
    it("should exit 0 and print the plan for a solvable problem", async () => {
      const deps = createDeps();
      const problem = problemFile("basic.json", {
        name: "basic",
        kind: { typing: ["FLAT_TYPING"] },
        referencePlan: { format: "sequential", content: "a" },
      });

      const code = await runServerCli(["--address", "0.0.0.0:2222", "--file-path", problem], deps);

      expect(code).toBe(0);
      expect(parseOutcomeLine(deps.writeOutcome.mock.calls[0]?.[0] ?? "")).toMatchObject({
        status: "plan",
        plan: { format: "sequential", content: "a" },
      });
    });

    it("should exit 2 when no plan exists", async () => {
      const deps = createDeps();
      const problem = problemFile("dead-end.json", { name: "dead-end", kind: {}, referencePlan: null });

      expect(await runServerCli(["--address", "0.0.0.0:2222", "--file-path", problem], deps)).toBe(2);
    });

    it("should exit 1 for a problem file that does not exist", async () => {
      const deps = createDeps();

      const code = await runServerCli(["--address", "0.0.0.0:2222", "--file-path", join(dir, "nope.json")], deps);

      expect(code).toBe(1);
      expect(parseOutcomeLine(deps.writeOutcome.mock.calls[0]?.[0] ?? "")).toMatchObject({
        status: "failure",
        error: { code: "INVALID_PROBLEM" },
      });
    });

    it("should exit 1 for a solver the endpoint does not host", async () => {
      const deps = createDeps();
      const problem = problemFile("named.json", { name: "named", kind: {}, referencePlan: null });

      const code = await runServerCli(
        ["--address", "0.0.0.0:2222", "--file-path", problem, "--solver", "aries"],
        deps
      );

      expect(code).toBe(1);
    });
  });

  describe("serve", () => {
    it("should serve until the shutdown signal and exit 0", async () => {
      const connection = new FakeEndpointConnection();
      const connect = vi.fn(async () => connection);
      let shutdown: (signal: string) => void = () => {};
      const shutdownSignal = () =>
        new Promise<string>((resolve) => {
          shutdown = resolve;
        });

      const running = runServerCli(["--address", "0.0.0.0:2222"], {
        ...createDeps(),
        env: { SERVICE_NAME: "lab-endpoint" },
        connect,
        shutdownSignal,
      });
      await vi.waitFor(() => expect(connection.subscriptions).toHaveLength(2));
      const reply = await connection.on("planwire.describe")[0]?.request("");
      shutdown("SIGTERM");

      expect(await running).toBe(0);
      expect(connect).toHaveBeenCalledWith({ servers: "nats://0.0.0.0:2222", name: "lab-endpoint" });
      expect(reply).toMatchObject({ solvers: [{ name: "replay" }] });
      expect(connection.drained).toBe(true);
    });
  });
});
