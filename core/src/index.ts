// Capabilities
export * from "./capabilities.js";

// Outcomes
export * from "./outcome.js";

// Protocol message Zod schemas (runtime validation)
export {
  PlanSchema,
  SolveMetaSchema,
  SolveFailureCodeSchema,
  SolveOutcomeSchema,
  SolveRequestSchema,
  SolveResponseSchema,
  SolverRolesSchema,
  SolverInfoSchema,
  DescribeResponseSchema,
} from "./envelope-schema.js";

// Errors
export * from "./errors.js";

// Problems
export * from "./problem.js";

// Pipeline
export { type Middleware, type SolveHandler, type SolveInvocation, buildPipeline } from "./pipeline.js";

// Utilities
export * from "./utils.js";

// Wire protocol (NATS solve request/response)
export * from "./wire.js";

// Addresses
export * from "./address.js";

// Command templates
export * from "./command-template.js";

// Exit codes and the OUTCOME line
export * from "./exit-codes.js";

// Child processes
export * from "./process.js";

// Logging
export * from "./logger.js";
