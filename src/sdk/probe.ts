import { Agent, fetch } from "undici";
import type { Dispatcher, Response } from "undici";
import { classifyNetworkError, isCertificateError } from "./errors.js";
import type {
  EndpointDescriptor,
  ErrorKind,
  Logger,
  ProbeContext,
  ProbeMode,
  ProbeOutcome,
  Prober,
  TlsMode,
} from "./types.js";

/**
 * Options for the HTTP prober.
 */
export interface HttpProbeOptions {
  /** Certificate policy (default: "fallback") */
  tls?: TlsMode;
  /** Path appended to the base URL for the measurement request (default: "/v1/messages") */
  probePath?: string;
  /** Model named in the measurement request body */
  probeModel?: string;
  /** Value of the anthropic-version header */
  apiVersion?: string;
  /** Statuses tagged as rateLimited (default: 409, 429) */
  limitedStatuses?: number[];
  /** Statuses on a streaming request that trigger the non-streaming retry (default: 400, 405, 422, 501) */
  streamRejectionStatuses?: number[];
  logger?: Logger;
}

export const DEFAULT_LIMITED_STATUSES = [409, 429];
export const DEFAULT_STREAM_REJECTION_STATUSES = [400, 405, 422, 501];

interface ResolvedProbeOptions {
  tls: TlsMode;
  probePath: string;
  probeModel: string;
  apiVersion: string;
  logger: Logger;
}

const DEFAULT_OPTIONS: Omit<ResolvedProbeOptions, "logger"> = {
  tls: "fallback",
  probePath: "/v1/messages",
  probeModel: "claude-3-5-haiku-latest",
  apiVersion: "2023-06-01",
};

type Attempt =
  | {
      received: true;
      status: number;
      latencyMs: number;
      mode: ProbeMode;
      tlsRelaxed: boolean;
    }
  | {
      received: false;
      errorKind: ErrorKind;
      detail: string;
      mode: ProbeMode;
      tlsRelaxed: boolean;
      certificateError: boolean;
    };

type SendResult =
  | { received: true; status: number; latencyMs: number }
  | {
      received: false;
      errorKind: ErrorKind;
      detail: string;
      certificateError: boolean;
    };

interface SendRequest {
  url: string;
  method: "HEAD" | "POST";
  headers: Record<string, string>;
  body?: string;
}

/**
 * HttpProbe measures one endpoint: an optional warm-up, a streaming request
 * timed to the first response bytes, and a single non-streaming retry when the
 * endpoint rejects streaming.
 *
 * One instance holds the connection pools for a batch and may be shared by all
 * concurrent probes of that batch. Call close() when the batch is done.
 *
 * @example
 * ```ts
 * const probe = new HttpProbe({ tls: "relaxed" });
 * const outcome = await probe.probe(
 *   { name: "main", baseURL: "https://api.example.com", token: "test-token" },
 *   { timeoutMs: 5000, warmup: false },
 * );
 * await probe.close();
 * ```
 */
export class HttpProbe implements Prober {
  private readonly options: ResolvedProbeOptions;
  private readonly limitedStatuses: Set<number>;
  private readonly streamRejectionStatuses: Set<number>;
  private readonly verifyingAgent: Agent;
  private readonly relaxedAgent: Agent;

  constructor(options?: HttpProbeOptions) {
    this.options = {
      tls: options?.tls ?? DEFAULT_OPTIONS.tls,
      probePath: options?.probePath ?? DEFAULT_OPTIONS.probePath,
      probeModel: options?.probeModel ?? DEFAULT_OPTIONS.probeModel,
      apiVersion: options?.apiVersion ?? DEFAULT_OPTIONS.apiVersion,
      logger: options?.logger ?? console,
    };
    this.limitedStatuses = new Set(
      options?.limitedStatuses ?? DEFAULT_LIMITED_STATUSES,
    );
    this.streamRejectionStatuses = new Set(
      options?.streamRejectionStatuses ?? DEFAULT_STREAM_REJECTION_STATUSES,
    );

    this.relaxedAgent = new Agent({ connect: { rejectUnauthorized: false } });
    this.verifyingAgent =
      this.options.tls === "relaxed" ? this.relaxedAgent : new Agent();
  }

  async probe(
    descriptor: EndpointDescriptor,
    context: ProbeContext,
  ): Promise<ProbeOutcome> {
    const timeoutMs = descriptor.timeoutOverride ?? context.timeoutMs;

    if (context.warmup) {
      // Connection priming only; whatever comes back is dropped.
      await this.attempt(
        this.buildWarmupRequest(descriptor),
        "nonStream",
        timeoutMs,
        context.signal,
      );
    }

    let attempt = await this.attempt(
      this.buildMeasureRequest(descriptor, "stream"),
      "stream",
      timeoutMs,
      context.signal,
    );

    if (attempt.received && this.streamRejectionStatuses.has(attempt.status)) {
      attempt = await this.attempt(
        this.buildMeasureRequest(descriptor, "nonStream"),
        "nonStream",
        timeoutMs,
        context.signal,
      );
    }

    return this.toOutcome(descriptor.name, attempt);
  }

  async close(): Promise<void> {
    // Abandoned requests are torn down, never awaited.
    await this.relaxedAgent.destroy();
    if (this.verifyingAgent !== this.relaxedAgent) {
      await this.verifyingAgent.destroy();
    }
  }

  private async attempt(
    request: SendRequest,
    mode: ProbeMode,
    timeoutMs: number,
    signal?: AbortSignal,
  ): Promise<Attempt> {
    const first = await this.send(request, this.verifyingAgent, timeoutMs, signal);
    const relaxed = this.options.tls === "relaxed";

    if (
      !first.received &&
      first.certificateError &&
      this.options.tls === "fallback"
    ) {
      const retry = await this.send(request, this.relaxedAgent, timeoutMs, signal);
      return { ...retry, mode, tlsRelaxed: true };
    }

    return { ...first, mode, tlsRelaxed: relaxed };
  }

  private async send(
    request: SendRequest,
    dispatcher: Dispatcher,
    timeoutMs: number,
    signal?: AbortSignal,
  ): Promise<SendResult> {
    if (signal?.aborted) {
      return batchAborted();
    }

    const controller = new AbortController();
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    const forwardAbort = () => controller.abort();
    signal?.addEventListener("abort", forwardAbort, { once: true });

    const start = Date.now();
    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: controller.signal,
        dispatcher,
      });
      const latencyMs = Date.now() - start;
      this.discardBody(response, request.url);
      return { received: true, status: response.status, latencyMs };
    } catch (error) {
      if (timedOut) {
        return {
          received: false,
          errorKind: "timeout",
          detail: `No response within ${timeoutMs}ms`,
          certificateError: false,
        };
      }
      if (signal?.aborted) {
        return batchAborted();
      }
      const classified = classifyNetworkError(error);
      return {
        received: false,
        errorKind: classified.kind,
        detail: classified.detail,
        certificateError: isCertificateError(classified),
      };
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener("abort", forwardAbort);
    }
  }

  private discardBody(response: Response, url: string): void {
    if (!response.body) {
      return;
    }
    response.body.cancel().catch((error: unknown) => {
      this.options.logger.warn(`Could not release response body from ${url}:`, error);
    });
  }

  private buildWarmupRequest(descriptor: EndpointDescriptor): SendRequest {
    return {
      url: descriptor.baseURL,
      method: "HEAD",
      headers: this.buildHeaders(descriptor),
    };
  }

  private buildMeasureRequest(
    descriptor: EndpointDescriptor,
    mode: ProbeMode,
  ): SendRequest {
    return {
      url: joinUrl(descriptor.baseURL, this.options.probePath),
      method: "POST",
      headers: {
        ...this.buildHeaders(descriptor),
        "content-type": "application/json",
        accept: mode === "stream" ? "text/event-stream" : "application/json",
      },
      body: JSON.stringify({
        model: this.options.probeModel,
        max_tokens: 1,
        messages: [{ role: "user", content: "ping" }],
        stream: mode === "stream",
      }),
    };
  }

  private buildHeaders(descriptor: EndpointDescriptor): Record<string, string> {
    const headers: Record<string, string> = {
      "anthropic-version": this.options.apiVersion,
    };
    if (descriptor.token) {
      headers.authorization = `Bearer ${descriptor.token}`;
      headers["x-api-key"] = descriptor.token;
    }
    return headers;
  }

  private toOutcome(name: string, attempt: Attempt): ProbeOutcome {
    if (!attempt.received) {
      return {
        name,
        reachable: false,
        errorKind: attempt.errorKind,
        rawDetail: attempt.detail,
        mode: attempt.mode,
        tlsRelaxed: attempt.tlsRelaxed,
      };
    }

    const outcome: ProbeOutcome = {
      name,
      reachable: true,
      latencyMs: attempt.latencyMs,
      httpStatus: attempt.status,
      mode: attempt.mode,
      tlsRelaxed: attempt.tlsRelaxed,
    };
    if (this.limitedStatuses.has(attempt.status)) {
      outcome.errorKind = "rateLimited";
      outcome.rawDetail = `HTTP ${attempt.status}`;
    }
    return outcome;
  }
}

function batchAborted(): SendResult {
  return {
    received: false,
    errorKind: "batchTimeout",
    detail: "Batch deadline reached before a response",
    certificateError: false,
  };
}

function joinUrl(baseURL: string, path: string): string {
  return `${baseURL.replace(/\/+$/, "")}/${path.replace(/^\/+/, "")}`;
}
