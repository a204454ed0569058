import type { ErrorKind } from "./types.js";

/**
 * Thrown before any probing starts when the caller breaks the batch contract.
 */
export class ProbeConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ProbeConfigError";
  }
}

const DNS_CODES = new Set(["ENOTFOUND", "EAI_AGAIN", "EAI_FAIL", "EAI_NODATA"]);

const TIMEOUT_CODES = new Set([
  "ETIMEDOUT",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
]);

// Certificate problems a relaxed-validation retry can get past.
const CERTIFICATE_CODES = new Set([
  "DEPTH_ZERO_SELF_SIGNED_CERT",
  "SELF_SIGNED_CERT_IN_CHAIN",
  "UNABLE_TO_VERIFY_LEAF_SIGNATURE",
  "UNABLE_TO_GET_ISSUER_CERT",
  "UNABLE_TO_GET_ISSUER_CERT_LOCALLY",
  "CERT_HAS_EXPIRED",
  "CERT_NOT_YET_VALID",
  "CERT_UNTRUSTED",
  "CERT_REVOKED",
  "CERT_SIGNATURE_FAILURE",
  "ERR_TLS_CERT_ALTNAME_INVALID",
]);

const MID_RESPONSE_CODES = new Set(["ECONNRESET", "EPIPE", "UND_ERR_SOCKET"]);

export interface ClassifiedError {
  kind: ErrorKind;
  code?: string;
  detail: string;
}

/**
 * Map a transport error (as thrown by undici's fetch) to an ErrorKind.
 * fetch wraps the socket error in `cause`, so the chain is searched for a code.
 */
export function classifyNetworkError(error: unknown): ClassifiedError {
  const code = findErrorCode(error);
  const detail = describeError(error);

  if (!code) {
    return { kind: "connectionRefused", detail };
  }
  if (code === "ECONNREFUSED") {
    return { kind: "connectionRefused", code, detail };
  }
  if (DNS_CODES.has(code)) {
    return { kind: "dnsFailure", code, detail };
  }
  if (TIMEOUT_CODES.has(code)) {
    return { kind: "timeout", code, detail };
  }
  if (
    CERTIFICATE_CODES.has(code) ||
    code === "EPROTO" ||
    code.startsWith("ERR_SSL_") ||
    code.startsWith("ERR_TLS_")
  ) {
    return { kind: "tlsFailure", code, detail };
  }
  if (code.startsWith("HPE_") || MID_RESPONSE_CODES.has(code)) {
    return { kind: "malformedResponse", code, detail };
  }
  return { kind: "connectionRefused", code, detail };
}

/**
 * True for certificate validation failures, as opposed to handshake failures
 * that relaxed validation cannot fix.
 */
export function isCertificateError(error: ClassifiedError): boolean {
  return error.code !== undefined && CERTIFICATE_CODES.has(error.code);
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    const cause = error.cause instanceof Error ? error.cause.message : undefined;
    return cause && cause !== error.message
      ? `${error.message}: ${cause}`
      : error.message;
  }
  return String(error);
}

function findErrorCode(error: unknown): string | undefined {
  let current: unknown = error;
  for (let depth = 0; depth < 5 && current; depth++) {
    if (typeof current !== "object" || current === null) {
      return undefined;
    }
    if ("code" in current && typeof current.code === "string") {
      return current.code;
    }
    current = "cause" in current ? current.cause : undefined;
  }
  return undefined;
}
