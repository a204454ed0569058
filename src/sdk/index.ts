export { HttpProbe, DEFAULT_LIMITED_STATUSES, DEFAULT_STREAM_REJECTION_STATUSES } from "./probe.js";
export { ProbeScheduler, runBatch, MAX_CONCURRENCY } from "./scheduler.js";
export { aggregate, classifyHealth, selectFailover } from "./aggregator.js";
export { ProbeConfigError, classifyNetworkError } from "./errors.js";
export { toResultRows } from "./sink.js";
export type { HttpProbeOptions } from "./probe.js";
export type { ResultRow, ResultSink } from "./sink.js";
export type {
  BatchOptions,
  BatchReport,
  EndpointDescriptor,
  ErrorKind,
  FailoverDecision,
  FailoverReason,
  HealthState,
  Logger,
  ProbeContext,
  ProbeMode,
  ProbeOutcome,
  Prober,
  ProgressCallback,
  ReportEntry,
  TlsMode,
} from "./types.js";
