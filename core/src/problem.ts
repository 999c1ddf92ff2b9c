/**
 * Problem documents and the capability query surface for problems.
 *
 * A problem file is JSON: the required capabilities (`kind`), an opaque
 * `body` in whatever encoding the solvers understand, and optionally a
 * reference plan used by the replay solver.
 */

import { readFile } from "node:fs/promises";
import { z } from "zod";
import { CapabilityDescriptor, CapabilityRecordSchema } from "./capabilities.js";
import { PlanSchema } from "./envelope-schema.js";
import { PlanningError, errorMessage } from "./errors.js";

const LOG_PREFIX = "planwire-core:problem";

export const ProblemDocumentSchema = z.object({
  name: z.string().min(1),
  kind: CapabilityRecordSchema,
  domain: z.string().optional(),
  body: z.unknown().optional(),
  /** Known answer: a plan, or null when the problem has none */
  referencePlan: PlanSchema.nullable().optional(),
});

export type ProblemDocument = z.infer<typeof ProblemDocumentSchema>;

export interface Problem {
  name: string;
  locator: string;
  kind: CapabilityDescriptor;
  document: ProblemDocument;
}

/**
 * Decode a problem document. The descriptor is always computed from the
 * document itself.
 *
 * @throws PlanningError INVALID_PROBLEM on malformed JSON or schema mismatch
 */
export function decodeProblem(text: string, locator: string): Problem {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new PlanningError({
      code: "INVALID_PROBLEM",
      message: `${LOG_PREFIX}:decodeProblem - Invalid JSON in ${locator}`,
      details: { locator, error: errorMessage(err) },
      cause: err,
    });
  }

  const parsed = ProblemDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    throw new PlanningError({
      code: "INVALID_PROBLEM",
      message: `${LOG_PREFIX}:decodeProblem - Invalid problem document ${locator}`,
      details: { locator, errors: parsed.error.flatten() },
    });
  }

  return {
    name: parsed.data.name,
    locator,
    kind: CapabilityDescriptor.fromRecord(parsed.data.kind),
    document: parsed.data,
  };
}

/**
 * Read and decode the problem at a locator (a file path).
 */
export async function loadProblem(
  locator: string,
  deps: { readFile?: (path: string) => Promise<string> } = {}
): Promise<Problem> {
  const read = deps.readFile ?? ((path: string) => readFile(path, "utf-8"));
  let text: string;
  try {
    text = await read(locator);
  } catch (err) {
    throw new PlanningError({
      code: "INVALID_PROBLEM",
      message: `${LOG_PREFIX}:loadProblem - Cannot read problem ${locator}`,
      details: { locator, error: errorMessage(err) },
      cause: err,
    });
  }
  return decodeProblem(text, locator);
}

/** The capabilities a problem requires. */
export function requirementsOf(problem: Problem): CapabilityDescriptor {
  return problem.kind;
}
