// SDK - probing, scheduling and failover selection
export {
  HttpProbe,
  ProbeScheduler,
  runBatch,
  aggregate,
  classifyHealth,
  selectFailover,
  toResultRows,
  ProbeConfigError,
} from "./sdk/index.js";
export type {
  BatchOptions,
  BatchReport,
  EndpointDescriptor,
  ErrorKind,
  FailoverDecision,
  HealthState,
  ProbeOutcome,
  Prober,
  ResultRow,
  ResultSink,
} from "./sdk/index.js";

// CLI - profiles file, run options and console reporting
export {
  ConsoleResultSink,
  loadProfiles,
  resolveRunOptions,
  runCli,
} from "./cli/index.js";
export type { RunOptions } from "./cli/index.js";
