/**
 * Unit tests for the command solver with a fake spawn.
 */

import { describe, it, expect, vi } from "vitest";
import { type SpawnFn, CapabilityDescriptor, ConfigurationError } from "@planwire/core";
import { FakeChild, problemOf } from "@planwire/core/testing";
import { SolverRegistry } from "../registry.js";
import { type CommandSolverConfig, defineCommandSolver } from "./command.js";

const flat = CapabilityDescriptor.builder().set("typing", "FLAT_TYPING").build();

const config: CommandSolverConfig = {
  name: "lpg",
  command: "lpg-plan --problem {instance} --label {problem}",
  capabilities: { typing: ["FLAT_TYPING"] },
  unsolvableExitCodes: [2],
};

function spawnWith(script: (child: FakeChild) => void) {
  const children: FakeChild[] = [];
  const spawn = vi.fn<SpawnFn>(() => {
    const child = new FakeChild();
    children.push(child);
    script(child);
    return child;
  });
  return { spawn, children };
}

async function createSolver(spawn: SpawnFn, options: unknown = {}) {
  return new SolverRegistry().register(defineCommandSolver(config, { spawn })).create("lpg", options);
}

describe("command solver", () => {
  it("should render the template and return stdout as the plan", async () => {
    const { spawn } = spawnWith((child) => child.exitLater(0, { stdout: "(pick a)\n(drop a)\n\n" }));
    const solver = await createSolver(spawn);

    const outcome = await solver.solve(problemOf(flat, { name: "blocks" }));

    expect(spawn).toHaveBeenCalledWith(
      "lpg-plan",
      ["--problem", "problems/blocks.json", "--label", "blocks"],
      { cwd: undefined, env: undefined }
    );
    expect(outcome).toMatchObject({
      status: "plan",
      plan: { format: "sequential", content: "(pick a)\n(drop a)" },
      meta: { solver: "lpg" },
    });
  });

  it("should pass cwd and merge env from the options", async () => {
    const { spawn } = spawnWith((child) => child.exitLater(0));
    const solver = await createSolver(spawn, { cwd: "/srv/planners", env: { PLANNER_HOME: "/opt/lpg" } });

    await solver.solve(problemOf(flat));

    expect(spawn.mock.calls[0]?.[2]).toEqual({
      cwd: "/srv/planners",
      env: expect.objectContaining({ PLANNER_HOME: "/opt/lpg" }),
    });
  });

  it("should map a configured exit code to unsolvable", async () => {
    const { spawn } = spawnWith((child) => child.exitLater(2));
    const solver = await createSolver(spawn);

    expect(await solver.solve(problemOf(flat))).toMatchObject({ status: "unsolvable" });
  });

  it("should report any other exit code as a solve failure with the stderr tail", async () => {
    const { spawn } = spawnWith((child) => child.exitLater(137, { stderr: "out of memory\n" }));
    const solver = await createSolver(spawn);

    const outcome = await solver.solve(problemOf(flat, { name: "blocks" }));

    expect(outcome).toMatchObject({
      status: "failure",
      error: {
        code: "SOLVE_FAILURE",
        message: "planwire-client:command:execute - lpg-plan exited with code 137",
        details: {
          command: "lpg-plan --problem problems/blocks.json --label blocks",
          exitCode: 137,
          signal: null,
          stderr: "out of memory\n",
        },
      },
    });
  });

  it("should report a planner that cannot start as a transport error", async () => {
    const { spawn } = spawnWith((child) => child.failLater("spawn lpg-plan ENOENT"));
    const solver = await createSolver(spawn);

    const outcome = await solver.solve(problemOf(flat));

    expect(outcome).toMatchObject({
      status: "failure",
      error: {
        code: "TRANSPORT_ERROR",
        message: "planwire-client:command:execute - Could not start lpg-plan: spawn lpg-plan ENOENT",
        details: { errorCode: "ENOENT" },
      },
    });
  });

  it("should kill the planner and time out after the configured timeout", async () => {
    const { spawn, children } = spawnWith(() => {});
    const solver = await createSolver(spawn, { timeoutMs: 20 });

    const outcome = await solver.solve(problemOf(flat));

    expect(children[0]?.signals).toEqual(["SIGTERM"]);
    expect(outcome).toMatchObject({
      status: "failure",
      error: { code: "TIMEOUT", message: "lpg.deadline: Timeout after 20ms", retryable: true },
    });
  });

  it("should kill the planner and cancel when destroyed mid-solve", async () => {
    const { spawn, children } = spawnWith(() => {});
    const solver = await createSolver(spawn);

    const pending = solver.solve(problemOf(flat));
    await solver.destroy();
    const outcome = await pending;

    expect(children[0]?.signals).toEqual(["SIGTERM"]);
    expect(outcome).toMatchObject({
      status: "failure",
      error: { code: "CANCELLED", message: 'planwire-client:solver:destroy - Solver "lpg" was destroyed' },
    });
  });

  it("should not launch the planner for an unsupported problem", async () => {
    const { spawn } = spawnWith((child) => child.exitLater(0));
    const solver = await createSolver(spawn);
    const numeric = CapabilityDescriptor.builder().set("fluents", "NUMERIC_FLUENTS").build();

    const outcome = await solver.solve(problemOf(numeric));

    expect(spawn).not.toHaveBeenCalled();
    expect(outcome).toMatchObject({ status: "unsupported", missing: { fluents: ["NUMERIC_FLUENTS"] } });
  });

  describe("definition", () => {
    it("should require the {instance} placeholder", () => {
      expect(() => defineCommandSolver({ ...config, command: "lpg-plan --problem {problem}" })).toThrow(
        ConfigurationError
      );
    });

    it("should reject unknown config keys", () => {
      expect(() => defineCommandSolver({ ...config, ...{ retries: 3 } })).toThrow(ConfigurationError);
    });

    it("should reject unknown options at creation", async () => {
      const { spawn } = spawnWith(() => {});
      await expect(createSolver(spawn, { timeout: 5 })).rejects.toThrow(
        'Unrecognized option(s) for solver "lpg": timeout'
      );
    });
  });
});
