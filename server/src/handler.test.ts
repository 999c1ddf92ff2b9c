/**
 * Unit tests for endpoint message handling.
 */

import { describe, it, expect, vi } from "vitest";
import { type Logger, type Problem, CapabilityDescriptor, PlanningError } from "@planwire/core";
import { problemOf } from "@planwire/core/testing";
import { handleDescribeMessage, handleSolveMessage } from "./handler.js";
import { SolverHost } from "./solver-host.js";

const flat = CapabilityDescriptor.builder().set("typing", "FLAT_TYPING").build();

async function startedHost(): Promise<SolverHost> {
  const host = SolverHost.fromConfig([{ type: "replay" }]);
  await host.start();
  return host;
}

function request(overrides: Record<string, unknown> = {}) {
  return JSON.stringify({
    id: "req-7",
    address: "0.0.0.0:2222",
    locator: "problems/depot.json",
    requires: { typing: ["FLAT_TYPING"] },
    ...overrides,
  });
}

function createMockLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies Logger;
}

describe("handleSolveMessage", () => {
  it("should solve the problem at the locator", async () => {
    const host = await startedHost();
    const loadProblem = vi.fn(async (locator: string): Promise<Problem> =>
      problemOf(flat, { locator, referencePlan: { format: "sequential", content: "(unload truck)" } })
    );

    const response = await handleSolveMessage({ body: request(), host, loadProblem });

    expect(loadProblem).toHaveBeenCalledWith("problems/depot.json");
    expect(response).toMatchObject({
      id: "req-7",
      outcome: { status: "plan", plan: { content: "(unload truck)" } },
    });
    await host.stop();
  });

  it("should answer INVALID_REQUEST with an empty id for a body that is not JSON", async () => {
    const host = await startedHost();

    const response = await handleSolveMessage({ body: "{oops", host });

    expect(response).toMatchObject({
      id: "",
      outcome: {
        status: "failure",
        error: { code: "INVALID_REQUEST", message: "planwire-server:handler:handleSolveMessage - Invalid JSON body" },
      },
    });
    await host.stop();
  });

  it("should keep the request id when the request is invalid", async () => {
    const host = await startedHost();

    const response = await handleSolveMessage({ body: request({ locator: "" }), host });

    expect(response).toMatchObject({
      id: "req-7",
      outcome: {
        status: "failure",
        error: { code: "INVALID_REQUEST", message: "planwire-server:handler:handleSolveMessage - Invalid solve request" },
      },
    });
    await host.stop();
  });

  it("should report a problem that cannot be loaded", async () => {
    const host = await startedHost();
    const loadProblem = async (locator: string): Promise<Problem> => {
      throw new PlanningError({ code: "INVALID_PROBLEM", message: `Cannot read problem ${locator}` });
    };

    const response = await handleSolveMessage({ body: request(), host, loadProblem });

    expect(response).toMatchObject({
      id: "req-7",
      outcome: {
        status: "failure",
        error: { code: "INVALID_PROBLEM", message: "Cannot read problem problems/depot.json" },
      },
    });
    await host.stop();
  });

  it("should use the problem's own requirements when the request disagrees", async () => {
    const host = await startedHost();
    const log = createMockLogger();
    const hierarchical = CapabilityDescriptor.builder().set("problem_class", "HIERARCHICAL").build();

    const response = await handleSolveMessage({
      body: request(),
      host,
      log,
      loadProblem: async (locator) => problemOf(hierarchical, { locator, referencePlan: null }),
    });

    expect(response.outcome.status).toBe("unsolvable");
    expect(log.warn).toHaveBeenCalledWith(
      { id: "req-7", declared: "typing:FLAT_TYPING", actual: "problem_class:HIERARCHICAL" },
      "planwire-server:handler:handleSolveMessage - Declared requirements differ from the problem; using the problem's"
    );
    await host.stop();
  });

  it("should pass the requested solver and timeout to the host", async () => {
    const host = await startedHost();
    const solve = vi.spyOn(host, "solve");
    const problem = problemOf(flat, { referencePlan: null });

    await handleSolveMessage({
      body: request({ solver: "replay", timeoutMs: 3_000 }),
      host,
      loadProblem: async () => problem,
    });

    expect(solve).toHaveBeenCalledWith(problem, { solver: "replay", timeoutMs: 3_000 });
    await host.stop();
  });
});

describe("handleDescribeMessage", () => {
  it("should list the hosted solvers", () => {
    const host = SolverHost.fromConfig([{ type: "replay", capabilities: { typing: ["FLAT_TYPING"] } }]);

    expect(handleDescribeMessage({ host })).toEqual({
      solvers: [
        {
          name: "replay",
          roles: { oneshotPlanner: true, planValidator: false, grounder: false },
          capabilities: { typing: ["FLAT_TYPING"] },
        },
      ],
    });
  });
});
