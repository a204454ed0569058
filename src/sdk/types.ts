/**
 * A named endpoint profile to probe.
 */
export interface EndpointDescriptor {
  /** Profile name, unique within a batch */
  name: string;
  /** Base URL of the API, e.g. "https://api.example.com" */
  baseURL: string;
  /** Opaque auth token (may be empty) */
  token: string;
  /** Optional per-endpoint timeout in milliseconds, replaces the run-wide timeout */
  timeoutOverride?: number;
}

/**
 * Why a probe did not end in a plain successful response.
 */
export type ErrorKind =
  | "connectionRefused"
  | "dnsFailure"
  | "tlsFailure"
  | "timeout"
  | "rateLimited"
  | "malformedResponse"
  | "batchTimeout"
  | "internal";

/**
 * Request mode that produced the final answer of a probe.
 */
export type ProbeMode = "stream" | "nonStream";

/**
 * Result of probing a single endpoint.
 */
export interface ProbeOutcome {
  name: string;
  /** True when any HTTP response was received */
  reachable: boolean;
  /** Time to first response bytes; only set when reachable */
  latencyMs?: number;
  httpStatus?: number;
  errorKind?: ErrorKind;
  rawDetail?: string;
  mode?: ProbeMode;
  /** Certificate validation was relaxed to get this answer */
  tlsRelaxed?: boolean;
}

export type HealthState = "Healthy" | "Degraded" | "Unreachable";

export interface ReportEntry {
  descriptor: EndpointDescriptor;
  outcome: ProbeOutcome;
  health: HealthState;
}

/**
 * Results of one batch, in the caller's input order.
 */
export interface BatchReport {
  results: ReportEntry[];
  /** Epoch milliseconds */
  startedAt: number;
  completedAt: number;
}

export type FailoverReason =
  | "CurrentHealthy"
  | "FasterAlternative"
  | "NoHealthyCandidate";

export interface FailoverDecision {
  chosen: string | null;
  reason: FailoverReason;
}

/**
 * Certificate policy for probes.
 * - "fallback": verify first, retry once without verification on a certificate error
 * - "relaxed": never verify
 * - "strict": certificate errors are reported as tlsFailure
 */
export type TlsMode = "fallback" | "relaxed" | "strict";

/**
 * Per-call settings handed to a prober by the scheduler.
 */
export interface ProbeContext {
  timeoutMs: number;
  warmup: boolean;
  /** Aborted when the batch deadline passes */
  signal?: AbortSignal;
}

/**
 * Anything that can measure one endpoint.
 */
export interface Prober {
  probe(descriptor: EndpointDescriptor, context: ProbeContext): Promise<ProbeOutcome>;
  /** Release pooled connections */
  close?(): Promise<void>;
}

/**
 * Progress hook, called once per completed probe.
 */
export type ProgressCallback = (completed: number, total: number) => void;

export type Logger = Pick<Console, "log" | "warn" | "error">;

/**
 * Options for a probe batch.
 */
export interface BatchOptions {
  /** Max probes in flight (default: 5, max: 10) */
  concurrencyLimit?: number;
  /** Timeout for each request of a probe (default: 8000) */
  perEndpointTimeoutMs?: number;
  /** Wall-clock cap for the whole batch; unset means no cap */
  batchTimeoutMs?: number;
  /** Send a discarded priming request before measuring (default: false) */
  warmupEnabled?: boolean;
  /** Statuses that mean "online but limited" (default: 409, 429) */
  limitedStatuses?: number[];
  /** Certificate policy for the built-in HTTP prober (default: "fallback") */
  tls?: TlsMode;
  /** Custom prober; when set, `tls` is not used and the prober is not closed */
  prober?: Prober;
  logger?: Logger;
}
