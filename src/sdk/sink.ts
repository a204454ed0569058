import type {
  BatchReport,
  ErrorKind,
  FailoverDecision,
  HealthState,
} from "./types.js";

/**
 * Consumer of batch progress and the final report, e.g. a terminal UI.
 * Progress arrives in completion order; the report is always in input order.
 */
export interface ResultSink {
  onProgress(completed: number, total: number): void;
  onReport(report: BatchReport, decision?: FailoverDecision): void;
}

/**
 * Flat view of one report entry for display or persistence.
 */
export interface ResultRow {
  name: string;
  health: HealthState;
  latencyMs?: number;
  errorKind?: ErrorKind;
  errorDetail?: string;
}

export function toResultRows(report: BatchReport): ResultRow[] {
  return report.results.map(({ descriptor, outcome, health }) => ({
    name: descriptor.name,
    health,
    latencyMs: outcome.latencyMs,
    errorKind: outcome.errorKind,
    errorDetail: outcome.rawDetail,
  }));
}
