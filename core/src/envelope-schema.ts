/**
 * Zod runtime schemas for the solve protocol messages.
 *
 * These mirror the TypeScript types in outcome.ts and wire.ts and validate
 * every message crossing a process boundary (endpoint requests, endpoint
 * responses, the one-shot OUTCOME line).
 */

import { z } from "zod";
import { CapabilityRecordSchema } from "./capabilities.js";
import type { Plan, SolveMeta, SolveOutcome } from "./outcome.js";
import type { DescribeResponse, SolveRequest, SolveResponse, SolverInfo } from "./wire.js";

export const PlanSchema: z.ZodType<Plan> = z.object({
  format: z.string().min(1),
  content: z.string(),
});

export const SolveMetaSchema: z.ZodType<SolveMeta> = z.object({
  solver: z.string().optional(),
  startedAtUnixMs: z.number(),
  endedAtUnixMs: z.number(),
  durationMs: z.number(),
});

export const SolveFailureCodeSchema = z.enum([
  "SOLVE_FAILURE",
  "TRANSPORT_ERROR",
  "INVALID_REQUEST",
  "INVALID_PROBLEM",
  "TIMEOUT",
  "CANCELLED",
  "INTERNAL_ERROR",
]);

export const SolveOutcomeSchema: z.ZodType<SolveOutcome> = z.discriminatedUnion("status", [
  z.object({
    status: z.literal("plan"),
    plan: PlanSchema,
    meta: SolveMetaSchema,
  }),
  z.object({
    status: z.literal("unsolvable"),
    meta: SolveMetaSchema,
  }),
  z.object({
    status: z.literal("unsupported"),
    reason: z.string(),
    missing: CapabilityRecordSchema,
    meta: SolveMetaSchema,
  }),
  z.object({
    status: z.literal("failure"),
    error: z.object({
      code: SolveFailureCodeSchema,
      message: z.string(),
      retryable: z.boolean(),
      details: z.unknown().optional(),
    }),
    meta: SolveMetaSchema,
  }),
]);

export const SolveRequestSchema: z.ZodType<SolveRequest> = z.object({
  id: z.string().min(1),
  address: z.string().min(1),
  locator: z.string().min(1),
  requires: CapabilityRecordSchema,
  solver: z.string().min(1).optional(),
  timeoutMs: z.number().int().positive().optional(),
});

export const SolveResponseSchema: z.ZodType<SolveResponse> = z.object({
  id: z.string(),
  outcome: SolveOutcomeSchema,
});

export const SolverRolesSchema = z
  .object({
    oneshotPlanner: z.boolean(),
    planValidator: z.boolean(),
    grounder: z.boolean(),
  })
  .strict();

export const SolverInfoSchema: z.ZodType<SolverInfo> = z.object({
  name: z.string().min(1),
  roles: SolverRolesSchema,
  capabilities: CapabilityRecordSchema,
});

export const DescribeResponseSchema: z.ZodType<DescribeResponse> = z.object({
  solvers: z.array(SolverInfoSchema),
});
