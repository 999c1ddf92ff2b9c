/**
 * Unit tests for SolverHost: building from config, negotiation and teardown.
 */

import { describe, it, expect, vi } from "vitest";
import { type SpawnFn, CapabilityDescriptor, ConfigurationError } from "@planwire/core";
import { FakeChild, problemOf } from "@planwire/core/testing";
import { SolverHost } from "./solver-host.js";
import type { SolverEntry } from "./config.js";

const flat = CapabilityDescriptor.builder().set("typing", "FLAT_TYPING").build();
const numeric = CapabilityDescriptor.builder().set("fluents", "NUMERIC_FLUENTS").build();

const lpg: SolverEntry = {
  type: "command",
  name: "lpg",
  command: "lpg-plan {instance}",
  capabilities: { typing: ["FLAT_TYPING"] },
  planFormat: "sequential",
  unsolvableExitCodes: [],
};

describe("SolverHost", () => {
  it("should register config entries in order and describe them", () => {
    const host = SolverHost.fromConfig([lpg, { type: "replay", capabilities: { typing: ["FLAT_TYPING"] } }]);

    expect(host.describe().map((info) => info.name)).toEqual(["lpg", "replay"]);
  });

  it("should reject duplicate solver names", () => {
    expect(() => SolverHost.fromConfig([{ type: "replay" }, { type: "replay" }])).toThrow(ConfigurationError);
  });

  it("should solve with the first supporting solver", async () => {
    const spawn = vi.fn<SpawnFn>(() => {
      const child = new FakeChild();
      child.exitLater(0, { stdout: "(go)\n" });
      return child;
    });
    const host = SolverHost.fromConfig([lpg, { type: "replay" }], { spawn });
    await host.start();

    const outcome = await host.solve(problemOf(flat));

    expect(outcome).toMatchObject({ status: "plan", plan: { content: "(go)" }, meta: { solver: "lpg" } });
    await host.stop();
  });

  it("should honour a named solver", async () => {
    const spawn = vi.fn<SpawnFn>();
    const host = SolverHost.fromConfig([lpg, { type: "replay" }], { spawn });
    await host.start();

    const outcome = await host.solve(problemOf(flat, { referencePlan: null }), { solver: "replay" });

    expect(spawn).not.toHaveBeenCalled();
    expect(outcome).toMatchObject({ status: "unsolvable" });
    await host.stop();
  });

  it("should answer unsupported when no hosted solver fits", async () => {
    const host = SolverHost.fromConfig([lpg]);
    await host.start();

    const outcome = await host.solve(problemOf(numeric));

    expect(outcome).toMatchObject({
      status: "unsupported",
      reason: "No hosted solver supports fluents:NUMERIC_FLUENTS",
      missing: { fluents: ["NUMERIC_FLUENTS"] },
    });
    await host.stop();
  });

  it("should answer INVALID_REQUEST for an unknown solver name", async () => {
    const host = SolverHost.fromConfig([{ type: "replay" }]);
    await host.start();

    const outcome = await host.solve(problemOf(flat), { solver: "lpg" });

    expect(outcome).toMatchObject({
      status: "failure",
      error: { code: "INVALID_REQUEST", message: 'planwire-server:solver-host:solve - Unknown solver "lpg"' },
    });
    await host.stop();
  });

  it("should fail start on unrecognized instance options and stop what started", async () => {
    const host = SolverHost.fromConfig([{ type: "replay" }, { ...lpg, options: { retries: 2 } }]);

    await expect(host.start()).rejects.toThrow('Unrecognized option(s) for solver "lpg": retries');
    expect(await host.solve(problemOf(flat), { solver: "replay" })).toMatchObject({
      status: "failure",
      error: { code: "INVALID_REQUEST" },
    });
  });
});
