import { aggregate } from "./aggregator.js";
import { ProbeConfigError, describeError } from "./errors.js";
import { DEFAULT_LIMITED_STATUSES, HttpProbe } from "./probe.js";
import type {
  BatchOptions,
  BatchReport,
  EndpointDescriptor,
  Logger,
  ProbeContext,
  ProbeOutcome,
  Prober,
  ProgressCallback,
  TlsMode,
} from "./types.js";

export const MAX_CONCURRENCY = 10;

export interface ResolvedBatchOptions {
  concurrencyLimit: number;
  perEndpointTimeoutMs: number;
  batchTimeoutMs?: number;
  warmupEnabled: boolean;
  limitedStatuses: number[];
  tls: TlsMode;
  prober?: Prober;
  logger: Logger;
}

const DEFAULT_OPTIONS = {
  concurrencyLimit: 5,
  perEndpointTimeoutMs: 8_000,
  warmupEnabled: false,
};

/**
 * ProbeScheduler runs a batch of probes on a bounded pool of workers and
 * returns one outcome per descriptor, in input order.
 *
 * @example
 * ```ts
 * const scheduler = new ProbeScheduler({ concurrencyLimit: 3, batchTimeoutMs: 20_000 });
 * const report = await scheduler.run(descriptors, (done, total) => {
 *   console.log(`${done}/${total}`);
 * });
 * ```
 */
export class ProbeScheduler {
  private readonly options: ResolvedBatchOptions;

  constructor(options?: BatchOptions) {
    this.options = resolveBatchOptions(options);
  }

  async run(
    descriptors: EndpointDescriptor[],
    onProgress?: ProgressCallback,
  ): Promise<BatchReport> {
    validateDescriptors(descriptors);

    const frozen = descriptors.map((descriptor) =>
      Object.freeze({ ...descriptor }),
    );
    const total = frozen.length;
    const slots: Array<ProbeOutcome | undefined> = new Array(total).fill(undefined);
    const prober = this.options.prober ?? this.createProber();
    const controller = new AbortController();
    const startedAt = Date.now();

    let nextIndex = 0;
    let completed = 0;
    let closed = false;

    const record = (index: number, outcome: ProbeOutcome): void => {
      if (closed || slots[index]) {
        return;
      }
      slots[index] = outcome;
      completed += 1;
      this.notifyProgress(onProgress, completed, total);
    };

    const worker = async (): Promise<void> => {
      while (!controller.signal.aborted && nextIndex < total) {
        const index = nextIndex;
        nextIndex += 1;
        const outcome = await this.probeOne(prober, frozen[index], controller.signal);
        record(index, outcome);
      }
    };

    const workerCount = Math.min(this.options.concurrencyLimit, total);
    const workers = Promise.all(Array.from({ length: workerCount }, () => worker()));

    let deadline: ReturnType<typeof setTimeout> | undefined;
    try {
      if (this.options.batchTimeoutMs === undefined) {
        await workers;
      } else {
        const batchTimeoutMs = this.options.batchTimeoutMs;
        await Promise.race([
          workers,
          new Promise<void>((resolve) => {
            deadline = setTimeout(resolve, batchTimeoutMs);
          }),
        ]);
      }
    } finally {
      closed = true;
      clearTimeout(deadline);
      controller.abort();
      if (!this.options.prober) {
        await this.closeProber(prober);
      }
    }

    const outcomes = frozen.map(
      (descriptor, index): ProbeOutcome =>
        slots[index] ?? {
          name: descriptor.name,
          reachable: false,
          errorKind: "batchTimeout",
          rawDetail: `Batch deadline of ${this.options.batchTimeoutMs}ms reached before a response`,
        },
    );

    return aggregate(
      outcomes,
      frozen,
      { startedAt, completedAt: Date.now() },
      this.options.limitedStatuses,
    );
  }

  private async probeOne(
    prober: Prober,
    descriptor: EndpointDescriptor,
    signal: AbortSignal,
  ): Promise<ProbeOutcome> {
    const context: ProbeContext = {
      timeoutMs: this.options.perEndpointTimeoutMs,
      warmup: this.options.warmupEnabled,
      signal,
    };

    try {
      const outcome = await prober.probe(descriptor, context);
      return { ...outcome, name: descriptor.name };
    } catch (error) {
      return {
        name: descriptor.name,
        reachable: false,
        errorKind: "internal",
        rawDetail: describeError(error),
      };
    }
  }

  private notifyProgress(
    onProgress: ProgressCallback | undefined,
    completed: number,
    total: number,
  ): void {
    if (!onProgress) {
      return;
    }
    try {
      onProgress(completed, total);
    } catch (error) {
      this.options.logger.error("Error in progress callback:", error);
    }
  }

  private async closeProber(prober: Prober): Promise<void> {
    try {
      await prober.close?.();
    } catch (error) {
      this.options.logger.warn("Error closing prober:", error);
    }
  }

  private createProber(): HttpProbe {
    return new HttpProbe({
      tls: this.options.tls,
      limitedStatuses: this.options.limitedStatuses,
      logger: this.options.logger,
    });
  }
}

/**
 * Probe every descriptor and return the ordered report.
 */
export async function runBatch(
  descriptors: EndpointDescriptor[],
  options?: BatchOptions,
  onProgress?: ProgressCallback,
): Promise<BatchReport> {
  return new ProbeScheduler(options).run(descriptors, onProgress);
}

export function resolveBatchOptions(options?: BatchOptions): ResolvedBatchOptions {
  const resolved: ResolvedBatchOptions = {
    concurrencyLimit: options?.concurrencyLimit ?? DEFAULT_OPTIONS.concurrencyLimit,
    perEndpointTimeoutMs:
      options?.perEndpointTimeoutMs ?? DEFAULT_OPTIONS.perEndpointTimeoutMs,
    batchTimeoutMs: options?.batchTimeoutMs,
    warmupEnabled: options?.warmupEnabled ?? DEFAULT_OPTIONS.warmupEnabled,
    limitedStatuses: options?.limitedStatuses ?? DEFAULT_LIMITED_STATUSES,
    tls: options?.tls ?? "fallback",
    prober: options?.prober,
    logger: options?.logger ?? console,
  };

  if (
    !Number.isInteger(resolved.concurrencyLimit) ||
    resolved.concurrencyLimit < 1 ||
    resolved.concurrencyLimit > MAX_CONCURRENCY
  ) {
    throw new ProbeConfigError(
      `concurrencyLimit must be an integer between 1 and ${MAX_CONCURRENCY}.`,
    );
  }
  if (!isPositive(resolved.perEndpointTimeoutMs)) {
    throw new ProbeConfigError("perEndpointTimeoutMs must be a positive number.");
  }
  if (resolved.batchTimeoutMs !== undefined && !isPositive(resolved.batchTimeoutMs)) {
    throw new ProbeConfigError("batchTimeoutMs must be a positive number.");
  }

  return resolved;
}

export function validateDescriptors(descriptors: EndpointDescriptor[]): void {
  if (!descriptors.length) {
    throw new ProbeConfigError("A batch requires at least one endpoint.");
  }

  const seen = new Set<string>();
  for (const descriptor of descriptors) {
    if (!descriptor.name) {
      throw new ProbeConfigError("Endpoint must include a name.");
    }
    if (seen.has(descriptor.name)) {
      throw new ProbeConfigError(`Duplicate endpoint name: ${descriptor.name}`);
    }
    seen.add(descriptor.name);

    if (!isHttpUrl(descriptor.baseURL)) {
      throw new ProbeConfigError(
        `Endpoint ${descriptor.name} has an invalid base URL: ${descriptor.baseURL}`,
      );
    }
    if (
      descriptor.timeoutOverride !== undefined &&
      !isPositive(descriptor.timeoutOverride)
    ) {
      throw new ProbeConfigError(
        `Endpoint ${descriptor.name} has a non-positive timeout override.`,
      );
    }
  }
}

function isPositive(value: number): boolean {
  return Number.isFinite(value) && value > 0;
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === "http:" || url.protocol === "https:";
  } catch {
    return false;
  }
}
