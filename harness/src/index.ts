export { ValidationHarness, describeFailure, formatFailure, type HarnessReport, type HarnessFailure, type ValidationHarnessParams } from "./harness.js";
export {
  loadHarnessConfig,
  DEFAULT_ADDRESS,
  DEFAULT_COMMAND_TEMPLATE,
  DEFAULT_BUILD_COMMAND,
  DEFAULT_EXECUTABLE,
  DEFAULT_CORPUS,
  HARNESS_PLACEHOLDERS,
  REPO_ROOT,
  type HarnessConfig,
  type HarnessOverrides,
} from "./config.js";
export { loadCorpus, locatorFor, CorpusFileSchema, type Corpus, type CorpusFile } from "./corpus.js";
export { runBuild, type BuildResult } from "./builder.js";
export { runInstance, renderInstanceCommand, type InstanceResult, type RenderedInstanceCommand } from "./runner.js";
export { runHarnessCli, USAGE, type HarnessCliDeps } from "./cli.js";
