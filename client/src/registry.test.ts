/**
 * Unit tests for SolverRegistry: registration, negotiation and creation.
 */

import { describe, it, expect } from "vitest";
import { CapabilityDescriptor, ConfigurationError } from "@planwire/core";
import { problemOf } from "@planwire/core/testing";
import { SolverRegistry } from "./registry.js";
import { defineReplaySolver } from "./solvers/replay.js";

const flat = CapabilityDescriptor.builder().set("typing", "FLAT_TYPING").build();
const hierarchical = CapabilityDescriptor.builder()
  .set("typing", "FLAT_TYPING")
  .set("typing", "HIERARCHICAL_TYPING")
  .build();

describe("SolverRegistry", () => {
  describe("register", () => {
    it("should reject a duplicate name", () => {
      const registry = new SolverRegistry().register(defineReplaySolver());

      expect(() => registry.register(defineReplaySolver())).toThrow(ConfigurationError);
    });

    it.each(["", "1st", "has space"])("should reject the name %j", (name) => {
      expect(() => new SolverRegistry().register(defineReplaySolver({ name }))).toThrow(/Invalid solver name/);
    });

    it("should keep registration order", () => {
      const registry = new SolverRegistry()
        .register(defineReplaySolver({ name: "first" }))
        .register(defineReplaySolver({ name: "second" }));

      expect(registry.list().map((d) => d.name)).toEqual(["first", "second"]);
      expect(registry.has("second")).toBe(true);
      expect(registry.get("third")).toBeUndefined();
    });

    it("should throw for an unknown name on require", () => {
      expect(() => new SolverRegistry().require("missing")).toThrow('Unknown solver "missing"');
    });
  });

  describe("negotiate", () => {
    const registry = new SolverRegistry()
      .register(defineReplaySolver({ name: "flat-only", capabilities: flat }))
      .register(defineReplaySolver({ name: "typed", capabilities: hierarchical }));

    it("should pick the first solver that covers the problem", () => {
      expect(registry.negotiate(flat)?.name).toBe("flat-only");
      expect(registry.negotiate(hierarchical)?.name).toBe("typed");
    });

    it("should find nothing when no solver covers the problem", () => {
      const temporal = CapabilityDescriptor.builder().set("time", "CONTINUOUS_TIME").build();
      expect(registry.negotiate(temporal)).toBeUndefined();
    });

    it("should find nothing for a role no solver has", () => {
      expect(registry.negotiate(flat, "grounder")).toBeUndefined();
    });

    it("should explain each decision", () => {
      expect(registry.explain(hierarchical)).toEqual([
        { name: "flat-only", eligible: false, reason: 'missing {"typing":["HIERARCHICAL_TYPING"]}' },
        { name: "typed", eligible: true, reason: "supports every required capability" },
      ]);
      expect(registry.explain(flat, "planValidator")[0]).toEqual({
        name: "flat-only",
        eligible: false,
        reason: "lacks role planValidator",
      });
    });
  });

  describe("describe", () => {
    it("should list names, roles and capability records", () => {
      const registry = new SolverRegistry().register(defineReplaySolver({ capabilities: flat }));

      expect(registry.describe()).toEqual([
        {
          name: "replay",
          roles: { oneshotPlanner: true, planValidator: false, grounder: false },
          capabilities: { typing: ["FLAT_TYPING"] },
        },
      ]);
    });
  });

  describe("create", () => {
    it("should return a started solver", async () => {
      const registry = new SolverRegistry().register(defineReplaySolver());

      const solver = await registry.create("replay");

      expect(solver.state).toBe("ready");
      expect(solver.name()).toBe("replay");
      await solver.destroy();
    });

    it("should reject unrecognized options", async () => {
      const registry = new SolverRegistry().register(defineReplaySolver());

      await expect(registry.create("replay", { colour: "blue", depth: 3 })).rejects.toThrow(
        'planwire-client:registry:create - Unrecognized option(s) for solver "replay": colour, depth'
      );
    });

    it("should reject options that are not an object", async () => {
      const registry = new SolverRegistry().register(defineReplaySolver());

      await expect(registry.create("replay", "fast")).rejects.toThrow(/Invalid options for solver "replay"/);
    });

    it("should reject an unknown solver", async () => {
      await expect(new SolverRegistry().create("nobody")).rejects.toBeInstanceOf(ConfigurationError);
    });
  });
});

describe("replay solver", () => {
  async function solveWith(referencePlan: Parameters<typeof problemOf>[1]) {
    const solver = await new SolverRegistry().register(defineReplaySolver()).create("replay");
    try {
      return await solver.solve(problemOf(flat, referencePlan));
    } finally {
      await solver.destroy();
    }
  }

  it("should answer with the reference plan", async () => {
    const outcome = await solveWith({ referencePlan: { format: "sequential", content: "(move a b)" } });

    expect(outcome).toMatchObject({
      status: "plan",
      plan: { format: "sequential", content: "(move a b)" },
      meta: { solver: "replay" },
    });
  });

  it("should answer unsolvable for a null reference plan", async () => {
    expect(await solveWith({ referencePlan: null })).toMatchObject({ status: "unsolvable" });
  });

  it("should fail when the problem carries no reference plan", async () => {
    const outcome = await solveWith({ name: "bare" });

    expect(outcome).toMatchObject({
      status: "failure",
      error: {
        code: "SOLVE_FAILURE",
        message: "planwire-client:replay:execute - Problem bare carries no reference plan",
        details: { locator: "problems/bare.json" },
      },
    });
  });
});
