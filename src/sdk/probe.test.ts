import { describe, it, expect, afterEach } from "@jest/globals";
import { readFileSync } from "node:fs";
import { createServer } from "node:http";
import type { IncomingMessage, RequestListener, Server, ServerResponse } from "node:http";
import { createServer as createHttpsServer } from "node:https";
import { join } from "node:path";
import { HttpProbe } from "./probe.js";
import type { EndpointDescriptor } from "./types.js";

interface RecordedRequest {
  method?: string;
  url?: string;
  headers: IncomingMessage["headers"];
  body: string;
}

interface TestServer {
  server: Server;
  baseURL: string;
  requests: RecordedRequest[];
}

type Handler = (request: RecordedRequest, res: ServerResponse) => void;

// Self-signed certificate for 127.0.0.1, trusted by nothing
const SELF_SIGNED = {
  key: readFileSync(join(__dirname, "__fixtures__", "localhost-key.pem")),
  cert: readFileSync(join(__dirname, "__fixtures__", "localhost-cert.pem")),
};

// Helper to run an in-process HTTP(S) endpoint on a random port
async function startServer(
  handler: Handler,
  options: { secure?: boolean } = {},
): Promise<TestServer> {
  const requests: RecordedRequest[] = [];
  const listener: RequestListener = (req, res) => {
    const chunks: Buffer[] = [];
    req.on("data", (chunk: Buffer) => chunks.push(chunk));
    req.on("end", () => {
      const recorded: RecordedRequest = {
        method: req.method,
        url: req.url,
        headers: req.headers,
        body: Buffer.concat(chunks).toString("utf8"),
      };
      requests.push(recorded);
      handler(recorded, res);
    });
  };
  const server: Server = options.secure
    ? createHttpsServer(SELF_SIGNED, listener)
    : createServer(listener);

  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  if (!address || typeof address === "string") {
    throw new Error("Test server has no TCP address.");
  }
  const scheme = options.secure ? "https" : "http";
  return { server, baseURL: `${scheme}://127.0.0.1:${address.port}`, requests };
}

async function stopServer(server: Server): Promise<void> {
  server.closeAllConnections();
  await new Promise<void>((resolve) => server.close(() => resolve()));
}

function isStreamRequest(request: RecordedRequest): boolean {
  const body: unknown = request.body ? JSON.parse(request.body) : null;
  return typeof body === "object" && body !== null && "stream" in body && body.stream === true;
}

function endpoint(baseURL: string, overrides: Partial<EndpointDescriptor> = {}): EndpointDescriptor {
  return { name: "main", baseURL, token: "test-token", ...overrides };
}

describe("HttpProbe", () => {
  let server: Server | undefined;
  let probe: HttpProbe | undefined;

  afterEach(async () => {
    await probe?.close();
    probe = undefined;
    if (server) {
      await stopServer(server);
      server = undefined;
    }
  });

  it("should measure a streaming endpoint", async () => {
    const started = await startServer((_request, res) => {
      res.writeHead(200, { "content-type": "text/event-stream" });
      res.write("event: message_start\ndata: {}\n\n");
      setTimeout(() => res.end(), 20);
    });
    server = started.server;
    probe = new HttpProbe();

    const outcome = await probe.probe(endpoint(started.baseURL), {
      timeoutMs: 2_000,
      warmup: false,
    });

    expect(outcome).toEqual({
      name: "main",
      reachable: true,
      latencyMs: expect.any(Number),
      httpStatus: 200,
      mode: "stream",
      tlsRelaxed: false,
    });
    expect(started.requests).toHaveLength(1);
    expect(started.requests[0].method).toBe("POST");
    expect(started.requests[0].url).toBe("/v1/messages");
    expect(isStreamRequest(started.requests[0])).toBe(true);
  });

  it("should send the token as bearer and api key", async () => {
    const started = await startServer((_request, res) => {
      res.writeHead(200);
      res.end();
    });
    server = started.server;
    probe = new HttpProbe();

    await probe.probe(endpoint(`${started.baseURL}/api/`), { timeoutMs: 2_000, warmup: false });

    const [request] = started.requests;
    expect(request.url).toBe("/api/v1/messages");
    expect(request.headers.authorization).toBe("Bearer test-token");
    expect(request.headers["x-api-key"]).toBe("test-token");
    expect(request.headers["anthropic-version"]).toBe("2023-06-01");
  });

  it("should omit auth headers for an empty token", async () => {
    const started = await startServer((_request, res) => {
      res.writeHead(200);
      res.end();
    });
    server = started.server;
    probe = new HttpProbe();

    await probe.probe(endpoint(started.baseURL, { token: "" }), {
      timeoutMs: 2_000,
      warmup: false,
    });

    expect(started.requests[0].headers.authorization).toBeUndefined();
    expect(started.requests[0].headers["x-api-key"]).toBeUndefined();
  });

  it("should fall back to a non-streaming request when streaming is rejected", async () => {
    const started = await startServer((request, res) => {
      res.writeHead(isStreamRequest(request) ? 400 : 200, {
        "content-type": "application/json",
      });
      res.end("{}");
    });
    server = started.server;
    probe = new HttpProbe();

    const outcome = await probe.probe(endpoint(started.baseURL), {
      timeoutMs: 2_000,
      warmup: false,
    });

    expect(outcome.reachable).toBe(true);
    expect(outcome.httpStatus).toBe(200);
    expect(outcome.mode).toBe("nonStream");
    expect(started.requests.map(isStreamRequest)).toEqual([true, false]);
  });

  it("should not retry when the streaming status is not a rejection", async () => {
    const started = await startServer((_request, res) => {
      res.writeHead(401);
      res.end();
    });
    server = started.server;
    probe = new HttpProbe();

    const outcome = await probe.probe(endpoint(started.baseURL), {
      timeoutMs: 2_000,
      warmup: false,
    });

    expect(outcome.httpStatus).toBe(401);
    expect(outcome.reachable).toBe(true);
    expect(outcome.mode).toBe("stream");
    expect(started.requests).toHaveLength(1);
  });

  it("should tag rate-limited responses", async () => {
    const started = await startServer((_request, res) => {
      res.writeHead(429);
      res.end();
    });
    server = started.server;
    probe = new HttpProbe();

    const outcome = await probe.probe(endpoint(started.baseURL), {
      timeoutMs: 2_000,
      warmup: false,
    });

    expect(outcome).toEqual({
      name: "main",
      reachable: true,
      latencyMs: expect.any(Number),
      httpStatus: 429,
      errorKind: "rateLimited",
      rawDetail: "HTTP 429",
      mode: "stream",
      tlsRelaxed: false,
    });
  });

  it("should time out an endpoint that never answers", async () => {
    const started = await startServer(() => {
      // never responds
    });
    server = started.server;
    probe = new HttpProbe();

    const begin = Date.now();
    const outcome = await probe.probe(endpoint(started.baseURL), {
      timeoutMs: 1_000,
      warmup: false,
    });
    const elapsed = Date.now() - begin;

    expect(outcome).toEqual({
      name: "main",
      reachable: false,
      errorKind: "timeout",
      rawDetail: "No response within 1000ms",
      mode: "stream",
      tlsRelaxed: false,
    });
    expect(elapsed).toBeGreaterThanOrEqual(950);
    expect(elapsed).toBeLessThan(1_200);
  });

  it("should prefer the descriptor timeout override", async () => {
    const started = await startServer(() => {
      // never responds
    });
    server = started.server;
    probe = new HttpProbe();

    const begin = Date.now();
    const outcome = await probe.probe(
      endpoint(started.baseURL, { timeoutOverride: 200 }),
      { timeoutMs: 10_000, warmup: false },
    );

    expect(outcome.errorKind).toBe("timeout");
    expect(Date.now() - begin).toBeLessThan(1_000);
  });

  it("should report a refused connection", async () => {
    const started = await startServer(() => undefined);
    await stopServer(started.server);
    probe = new HttpProbe();

    const outcome = await probe.probe(endpoint(started.baseURL), {
      timeoutMs: 2_000,
      warmup: false,
    });

    expect(outcome.reachable).toBe(false);
    expect(outcome.errorKind).toBe("connectionRefused");
    expect(outcome.latencyMs).toBeUndefined();
  });

  it("should send a warm-up request before measuring and ignore its status", async () => {
    const started = await startServer((request, res) => {
      res.writeHead(request.method === "HEAD" ? 500 : 200);
      res.end();
    });
    server = started.server;
    probe = new HttpProbe();

    const outcome = await probe.probe(endpoint(started.baseURL), {
      timeoutMs: 2_000,
      warmup: true,
    });

    expect(started.requests.map((r) => r.method)).toEqual(["HEAD", "POST"]);
    expect(outcome.httpStatus).toBe(200);
    expect(outcome.mode).toBe("stream");
  });

  it("should give up with batchTimeout when the batch is already aborted", async () => {
    const started = await startServer((_request, res) => {
      res.writeHead(200);
      res.end();
    });
    server = started.server;
    probe = new HttpProbe();
    const controller = new AbortController();
    controller.abort();

    const outcome = await probe.probe(endpoint(started.baseURL), {
      timeoutMs: 2_000,
      warmup: false,
      signal: controller.signal,
    });

    expect(outcome.errorKind).toBe("batchTimeout");
    expect(outcome.reachable).toBe(false);
    expect(started.requests).toHaveLength(0);
  });

  it("should abandon an in-flight request when the batch aborts", async () => {
    const started = await startServer(() => {
      // never responds
    });
    server = started.server;
    probe = new HttpProbe();
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 100);

    const begin = Date.now();
    const outcome = await probe.probe(endpoint(started.baseURL), {
      timeoutMs: 5_000,
      warmup: false,
      signal: controller.signal,
    });

    expect(outcome.errorKind).toBe("batchTimeout");
    expect(Date.now() - begin).toBeLessThan(1_000);
  });

  it("should use custom probe path and limited statuses", async () => {
    const started = await startServer((_request, res) => {
      res.writeHead(402);
      res.end();
    });
    server = started.server;
    probe = new HttpProbe({ probePath: "/health", limitedStatuses: [402] });

    const outcome = await probe.probe(endpoint(started.baseURL), {
      timeoutMs: 2_000,
      warmup: false,
    });

    expect(started.requests[0].url).toBe("/health");
    expect(outcome.errorKind).toBe("rateLimited");
  });

  it("should report relaxed TLS when configured", async () => {
    const started = await startServer((_request, res) => {
      res.writeHead(204);
      res.end();
    });
    server = started.server;
    probe = new HttpProbe({ tls: "relaxed" });

    const outcome = await probe.probe(endpoint(started.baseURL), {
      timeoutMs: 2_000,
      warmup: false,
    });

    expect(outcome.httpStatus).toBe(204);
    expect(outcome.tlsRelaxed).toBe(true);
  });

  describe("TLS", () => {
    it("should retry a self-signed endpoint without certificate checks", async () => {
      const started = await startServer(
        (_request, res) => {
          res.writeHead(200, { "content-type": "text/event-stream" });
          res.end("event: message_start\ndata: {}\n\n");
        },
        { secure: true },
      );
      server = started.server;
      probe = new HttpProbe();

      const outcome = await probe.probe(endpoint(started.baseURL), {
        timeoutMs: 2_000,
        warmup: false,
      });

      expect(outcome).toEqual({
        name: "main",
        reachable: true,
        latencyMs: expect.any(Number),
        httpStatus: 200,
        mode: "stream",
        tlsRelaxed: true,
      });
      expect(started.requests).toHaveLength(1);
    });

    it("should report tlsFailure for a self-signed endpoint in strict mode", async () => {
      const started = await startServer(
        (_request, res) => {
          res.writeHead(200);
          res.end();
        },
        { secure: true },
      );
      server = started.server;
      probe = new HttpProbe({ tls: "strict" });

      const outcome = await probe.probe(endpoint(started.baseURL), {
        timeoutMs: 2_000,
        warmup: false,
      });

      expect(outcome.reachable).toBe(false);
      expect(outcome.errorKind).toBe("tlsFailure");
      expect(outcome.tlsRelaxed).toBe(false);
      expect(started.requests).toHaveLength(0);
    });

    it("should apply the same fallback to the warm-up request", async () => {
      const started = await startServer(
        (_request, res) => {
          res.writeHead(200);
          res.end();
        },
        { secure: true },
      );
      server = started.server;
      probe = new HttpProbe();

      const outcome = await probe.probe(endpoint(started.baseURL), {
        timeoutMs: 2_000,
        warmup: true,
      });

      expect(started.requests.map((r) => r.method)).toEqual(["HEAD", "POST"]);
      expect(outcome.httpStatus).toBe(200);
      expect(outcome.tlsRelaxed).toBe(true);
    });
  });
});
