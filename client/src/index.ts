// Client
export { PlanningClient, type PlanningClientOptions, type ClientSolveOptions } from "./client.js";
export { type PlanningClientConfig, defaultPlanningClientConfig } from "./config.js";

// Solver abstraction
export {
  AbstractSolver,
  ONESHOT_PLANNER,
  type Solver,
  type SolverDefinition,
  type SolverContext,
  type SolverState,
  type SolveOptions,
} from "./solver.js";
export { SolverRegistry, type SolverEligibility } from "./registry.js";

// Built-in solvers
export { defineReplaySolver, ReplayOptionsSchema, type ReplayOptions, type ReplaySolverConfig } from "./solvers/replay.js";
export {
  defineCommandSolver,
  CommandSolverConfigSchema,
  CommandOptionsSchema,
  COMMAND_PLACEHOLDERS,
  type CommandSolverConfig,
  type CommandOptions,
} from "./solvers/command.js";
export { defineRemoteSolver, RemoteOptionsSchema, type RemoteOptions, type RemoteSolverConfig } from "./solvers/remote.js";

// Middleware
export { createCapabilityGateMiddleware } from "./middleware/capability-gate.js";
export { createDeadlineMiddleware } from "./middleware/deadline.js";
export { createLoggingMiddleware } from "./middleware/logging.js";

// Transport
export * from "./transport/index.js";
