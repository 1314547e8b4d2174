/**
 * Best-effort JSON handling for display.
 * Every helper here is total: bad input yields a fallback, never a throw.
 */

import type { JsonRpcCall, JsonRpcErrorResponse } from "../types/index.js";

/** Result of a fallible JSON decode */
export type DecodeResult =
  | { ok: true; value: unknown }
  | { ok: false; reason: string };

/** Parse JSON text without throwing */
export function decodeJson(text: string): DecodeResult {
  try {
    return { ok: true, value: JSON.parse(text) as unknown };
  } catch (error) {
    return {
      ok: false,
      reason: error instanceof Error ? error.message : String(error),
    };
  }
}

const INDENT = "  ";
const WHITESPACE = new Set([" ", "\t", "\n", "\r"]);

function nextSignificant(text: string, from: number): number {
  let i = from;
  while (i < text.length && WHITESPACE.has(text.charAt(i))) i++;
  return i;
}

/**
 * Re-indent valid JSON text with two spaces per level.
 * Only whitespace outside strings changes, so number tokens, escapes and
 * duplicate keys are printed exactly as sent.
 */
function reindentJson(text: string): string {
  let out = "";
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i);

    if (inString) {
      out += ch;
      if (escaped) {
        escaped = false;
      } else if (ch === "\\") {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }

    if (WHITESPACE.has(ch)) continue;

    switch (ch) {
      case '"':
        inString = true;
        out += ch;
        break;
      case "{":
      case "[": {
        const close = ch === "{" ? "}" : "]";
        const next = nextSignificant(text, i + 1);
        if (text.charAt(next) === close) {
          out += ch + close;
          i = next;
        } else {
          depth++;
          out += ch + "\n" + INDENT.repeat(depth);
        }
        break;
      }
      case "}":
      case "]":
        depth--;
        out += "\n" + INDENT.repeat(depth) + ch;
        break;
      case ",":
        out += ",\n" + INDENT.repeat(depth);
        break;
      case ":":
        out += ": ";
        break;
      default:
        out += ch;
    }
  }

  return out;
}

/** Pretty-print JSON text with two-space indent, or return it verbatim */
export function prettyPrintOrRaw(text: string): string {
  const decoded = decodeJson(text);
  if (!decoded.ok) {
    return text;
  }
  return reindentJson(text);
}

/**
 * Render a body for the terminal.
 * Empty bodies render as `null`; non-UTF-8 bytes are decoded lossily.
 */
export function renderDisplayJson(body: Uint8Array): string {
  if (body.length === 0) {
    return "null";
  }
  return prettyPrintOrRaw(Buffer.from(body).toString("utf8"));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Narrow a decoded value to a JSON-RPC call */
export function asJsonRpcCall(value: unknown): JsonRpcCall | null {
  if (!isRecord(value)) return null;
  const { id, jsonrpc, method, params } = value;

  if (typeof id !== "number") return null;
  if (typeof jsonrpc !== "string") return null;
  if (typeof method !== "string") return null;
  if (params !== undefined && !Array.isArray(params)) return null;

  const call: JsonRpcCall = { id, jsonrpc, method };
  if (Array.isArray(params)) {
    call.params = params;
  }
  return call;
}

/** Narrow a decoded value to a JSON-RPC error response */
export function asJsonRpcErrorResponse(
  value: unknown
): JsonRpcErrorResponse | null {
  if (!isRecord(value)) return null;
  const { id, jsonrpc, error } = value;

  if (typeof id !== "number") return null;
  if (typeof jsonrpc !== "string") return null;
  if (!isRecord(error)) return null;
  if (typeof error.code !== "number" || typeof error.message !== "string") {
    return null;
  }

  return { id, jsonrpc, error: { code: error.code, message: error.message } };
}

/** Sniff a JSON-RPC call out of (possibly non-JSON) text */
export function parseJsonRpcCall(text: string): JsonRpcCall | null {
  const decoded = decodeJson(text);
  return decoded.ok ? asJsonRpcCall(decoded.value) : null;
}

/** Check whether text holds a JSON-RPC error response */
export function isJsonRpcErrorResponse(text: string): boolean {
  const decoded = decodeJson(text);
  return decoded.ok && asJsonRpcErrorResponse(decoded.value) !== null;
}
