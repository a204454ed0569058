export { runCli, parseArgs, UsageError } from "./app.js";
export {
  resolveRunOptions,
  resolveConfigPath,
  DEFAULT_RUN_OPTIONS,
  DEFAULT_CONFIG_PATH,
} from "./config.js";
export {
  loadProfiles,
  parseProfiles,
  findActiveProfile,
  ProfileConfigError,
} from "./profiles.js";
export { ConsoleResultSink, formatResultLine, formatDecision } from "./reporter.js";
export type { CliArgs, CliDeps } from "./app.js";
export type { RunOptions, RunOptionInput } from "./config.js";
