/**
 * Error model for exchange failures.
 * Failures never escape an exchange: they become a synthesized JSON-RPC error body.
 */

import type { JsonRpcErrorResponse } from "../types/index.js";

/** Internal error code used for synthesized failures */
export const INTERNAL_ERROR_CODE = -32603;

/** Pipeline phase a failure happened in */
export type FailurePhase = "processing request" | "processing response";

/**
 * construction: outbound request could not be assembled
 * transport: upstream could not be reached
 * read: upstream response body could not be read
 */
export type SnoopErrorKind = "construction" | "transport" | "read";

export class SnoopError extends Error {
  readonly kind: SnoopErrorKind;

  constructor(kind: SnoopErrorKind, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "SnoopError";
    this.kind = kind;
  }
}

/** Error with a Node system error code */
function errorCode(value: unknown): string | undefined {
  if (typeof value !== "object" || value === null || !("code" in value)) {
    return undefined;
  }
  return typeof value.code === "string" ? value.code : undefined;
}

const TLS_CERT_CODES = new Set([
  "CERT_HAS_EXPIRED",
  "DEPTH_ZERO_SELF_SIGNED_CERT",
  "SELF_SIGNED_CERT_IN_CHAIN",
  "ERR_TLS_CERT_ALTNAME_INVALID",
]);

function describeCause(cause: unknown, host: string | undefined): string | null {
  const code = errorCode(cause);
  const target = host ?? "upstream";

  switch (code) {
    case undefined:
      return null;
    case "ECONNREFUSED":
      return `connection refused by ${target}`;
    case "ENOTFOUND":
      return `could not resolve hostname ${target}`;
    case "ETIMEDOUT":
      return `timed out connecting to ${target}`;
    case "ECONNRESET":
    case "EPIPE":
      return `${target} closed the connection unexpectedly`;
    default:
      if (TLS_CERT_CODES.has(code) || code.startsWith("UNABLE_TO_VERIFY")) {
        return `TLS certificate error from ${target}`;
      }
      return `${code} from ${target}`;
  }
}

/**
 * Human readable cause text for an exchange failure.
 * Socket errors carry a system error code, either on the error itself or on
 * the `cause` of a wrapping error.
 */
export function describeFailure(error: unknown, host?: string): string {
  if (error instanceof SnoopError) {
    const detail =
      error.cause !== undefined ? describeCause(error.cause, host) : null;
    return `${error.kind} error: ${detail ?? error.message}`;
  }

  if (error instanceof Error) {
    return (
      describeCause(error, host) ??
      describeCause(error.cause, host) ??
      error.message
    );
  }

  return String(error);
}

/** Synthesized body returned to the client when an exchange fails */
export function toRpcErrorResponse(
  phase: FailurePhase,
  error: unknown,
  host?: string
): JsonRpcErrorResponse {
  return {
    id: 1,
    jsonrpc: "2.0",
    error: {
      code: INTERNAL_ERROR_CODE,
      message: `${phase}: ${describeFailure(error, host)}`,
    },
  };
}
