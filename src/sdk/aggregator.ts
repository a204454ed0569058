import { DEFAULT_LIMITED_STATUSES } from "./probe.js";
import type {
  BatchReport,
  EndpointDescriptor,
  FailoverDecision,
  HealthState,
  ProbeOutcome,
  ReportEntry,
} from "./types.js";

/**
 * Derive the health state of one outcome.
 *
 * Any response to a streaming request counts as Healthy; a non-streaming
 * response only does with a 2xx/3xx status. Statuses in `limitedStatuses`
 * are Degraded in either mode.
 */
export function classifyHealth(
  outcome: ProbeOutcome,
  limitedStatuses: Iterable<number> = DEFAULT_LIMITED_STATUSES,
): HealthState {
  if (!outcome.reachable) {
    return "Unreachable";
  }

  const status = outcome.httpStatus;
  if (outcome.errorKind === "rateLimited") {
    return "Degraded";
  }
  if (status === undefined) {
    return "Healthy";
  }
  if (new Set(limitedStatuses).has(status)) {
    return "Degraded";
  }
  if (status >= 200 && status < 400) {
    return "Healthy";
  }
  return outcome.mode === "nonStream" ? "Degraded" : "Healthy";
}

/**
 * Arrange outcomes in the caller's descriptor order and attach health states.
 * A descriptor with no outcome gets an internal-error entry; outcomes for
 * unknown names are dropped.
 */
export function aggregate(
  outcomes: ProbeOutcome[],
  originalOrder: EndpointDescriptor[],
  timing: { startedAt: number; completedAt: number },
  limitedStatuses: Iterable<number> = DEFAULT_LIMITED_STATUSES,
): BatchReport {
  const byName = new Map<string, ProbeOutcome>();
  for (const outcome of outcomes) {
    if (!byName.has(outcome.name)) {
      byName.set(outcome.name, outcome);
    }
  }

  const limited = Array.from(limitedStatuses);
  const results: ReportEntry[] = originalOrder.map((descriptor) => {
    const outcome: ProbeOutcome = byName.get(descriptor.name) ?? {
      name: descriptor.name,
      reachable: false,
      errorKind: "internal",
      rawDetail: "No outcome recorded for this endpoint",
    };
    return { descriptor, outcome, health: classifyHealth(outcome, limited) };
  });

  return {
    results,
    startedAt: timing.startedAt,
    completedAt: timing.completedAt,
  };
}

/**
 * Pick the profile to make active.
 *
 * A Healthy current profile is always kept. Otherwise the Healthy entry with
 * the lowest latency wins, earliest in the report on ties.
 */
export function selectFailover(
  report: BatchReport,
  currentActiveName?: string,
): FailoverDecision {
  if (currentActiveName !== undefined) {
    const current = report.results.find(
      (entry) => entry.descriptor.name === currentActiveName,
    );
    if (current?.health === "Healthy") {
      return { chosen: currentActiveName, reason: "CurrentHealthy" };
    }
  }

  let best: ReportEntry | undefined;
  for (const entry of report.results) {
    if (entry.health !== "Healthy") {
      continue;
    }
    if (!best || latencyOf(entry) < latencyOf(best)) {
      best = entry;
    }
  }

  if (!best) {
    return { chosen: null, reason: "NoHealthyCandidate" };
  }
  return { chosen: best.descriptor.name, reason: "FasterAlternative" };
}

function latencyOf(entry: ReportEntry): number {
  return entry.outcome.latencyMs ?? Number.POSITIVE_INFINITY;
}
