/**
 * Decides whether, and how much of, each direction of an exchange is logged.
 *
 * Precedence:
 * 1. Either direction dropped → log everything
 * 2. JSON-RPC method rule covering this direction
 * 3. Request path rule covering this direction
 * 4. Log everything, unlabeled
 */

import {
  isDropped,
  scopeCovers,
  type Direction,
  type JsonRpcCall,
  type PacketType,
  type ProxyConfig,
  type SuppressDecision,
} from "@json-rpc-snoop/core";

export interface SuppressionInput {
  direction: Direction;
  /** Request body sniffed as a JSON-RPC call, if it is one */
  requestCall: JsonRpcCall | null;
  requestPath: string;
  requestType: PacketType;
  responseType: PacketType;
}

/** What the presenter should print for one direction */
export type LogPlan =
  | { kind: "skip" }
  | { kind: "log"; body: string | null; label: string };

/** Matching rule for this direction, or null to log in full */
export function decideSuppression(
  input: SuppressionInput,
  config: ProxyConfig
): SuppressDecision | null {
  const { direction, requestCall, requestPath, requestType, responseType } =
    input;

  if (isDropped(requestType) || isDropped(responseType)) {
    return null;
  }

  if (requestCall !== null) {
    const rule = config.suppressMethods.get(requestCall.method);
    if (rule !== undefined && scopeCovers(rule.scope, direction)) {
      return { lineLimit: rule.lines, label: `[method ${requestCall.method}]` };
    }
  }

  const pathRule = config.suppressPaths.get(requestPath);
  if (pathRule !== undefined && scopeCovers(pathRule.scope, direction)) {
    return { lineLimit: pathRule.lines, label: requestPath };
  }

  return null;
}

/**
 * Keep at most `limit` lines: the first ceil(limit/2) and the last
 * floor(limit/2), joined by a single "..." line.
 */
export function trimJson(json: string, limit: number): string {
  if (limit <= 0) {
    return "";
  }

  const lines = json.split("\n");
  if (limit >= lines.length) {
    return json;
  }

  const head = Math.ceil(limit / 2);
  const tail = Math.floor(limit / 2);

  return [
    ...lines.slice(0, head),
    "...",
    ...lines.slice(lines.length - tail),
  ].join("\n");
}

/**
 * Turn a decision into what gets printed.
 * Requests are labeled with the rule label or their path; responses never are.
 */
export function planLog(
  direction: Direction,
  json: string,
  decision: SuppressDecision | null,
  requestPath: string
): LogPlan {
  if (decision === null) {
    return {
      kind: "log",
      body: json,
      label: direction === "request" ? requestPath : "",
    };
  }

  const label = direction === "request" ? decision.label : "";

  if (decision.lineLimit < 0) {
    return { kind: "skip" };
  }
  if (decision.lineLimit === 0) {
    return { kind: "log", body: null, label };
  }
  return { kind: "log", body: trimJson(json, decision.lineLimit), label };
}
