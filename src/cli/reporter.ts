import type { ResultSink } from "../sdk/sink.js";
import type {
  BatchReport,
  FailoverDecision,
  HealthState,
  Logger,
  ReportEntry,
} from "../sdk/types.js";

const HEALTH_ICONS: Record<HealthState, string> = {
  Healthy: "✓",
  Degraded: "!",
  Unreachable: "✗",
};

/**
 * Prints progress and the final report to a console-like logger.
 */
export class ConsoleResultSink implements ResultSink {
  constructor(private readonly logger: Logger = console) {}

  onProgress(completed: number, total: number): void {
    this.logger.log(`Probed ${completed}/${total}`);
  }

  onReport(report: BatchReport, decision?: FailoverDecision): void {
    const elapsedMs = report.completedAt - report.startedAt;
    this.logger.log("");
    const timestamp = new Date(report.completedAt).toISOString();
    this.logger.log(
      `[${timestamp}] Results (${report.results.length} endpoints, ${elapsedMs}ms):`,
    );
    for (const entry of report.results) {
      this.logger.log(`  ${formatResultLine(entry)}`);
    }

    if (decision) {
      this.logger.log("");
      this.logger.log(formatDecision(decision));
    }
  }
}

/**
 * One report line, e.g. `✓ main → api.example.com Healthy 120ms`.
 */
export function formatResultLine(entry: ReportEntry): string {
  const { descriptor, outcome, health } = entry;
  const latency = outcome.latencyMs === undefined ? "-" : `${outcome.latencyMs}ms`;
  let line = `${HEALTH_ICONS[health]} ${descriptor.name} → ${hostOf(descriptor.baseURL)} ${health} ${latency}`;

  if (outcome.httpStatus !== undefined) {
    line += ` HTTP ${outcome.httpStatus}`;
  }
  if (outcome.errorKind) {
    line += ` [${outcome.errorKind}]`;
  }
  if (outcome.tlsRelaxed) {
    line += " (unverified TLS)";
  }
  return line;
}

export function formatDecision(decision: FailoverDecision): string {
  switch (decision.reason) {
    case "CurrentHealthy":
      return `✅ Current profile is healthy: ${decision.chosen}`;
    case "FasterAlternative":
      return `🔄 Best available profile: ${decision.chosen}`;
    case "NoHealthyCandidate":
      return "❌ No healthy profile available";
  }
}

function hostOf(baseURL: string): string {
  try {
    return new URL(baseURL).host;
  } catch {
    return "unknown";
  }
}
