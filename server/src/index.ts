export {
  loadServerConfig,
  ServerConfigFileSchema,
  SolverEntrySchema,
  DEFAULT_SOLVERS,
  type ServerConfig,
  type ServerConfigFile,
  type SolverEntry,
  type ConfigOverrides,
} from "./config.js";
export { SolverHost } from "./solver-host.js";
export { handleSolveMessage, handleDescribeMessage, type HandleSolveMessageParams } from "./handler.js";
export {
  SolverEndpoint,
  natsEndpointConnector,
  type SolverEndpointParams,
  type EndpointConnection,
  type EndpointConnector,
  type EndpointMessage,
  type EndpointSubscription,
} from "./endpoint.js";
export { runOneShot, type OneShotResult } from "./oneshot.js";
export { runServerCli, parseServerArgs, USAGE, UsageError, type ServerCliArgs, type ServerCliDeps } from "./cli.js";
