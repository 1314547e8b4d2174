/**
 * One inbound request through the whole pipeline.
 * Every failure is caught here; the caller always gets exactly one outcome.
 */

import {
  decodeJson,
  parseJsonRpcCall,
  toRpcErrorResponse,
  type Direction,
  type FailurePhase,
  type HeaderSnapshot,
  type JsonRpcCall,
  type PacketType,
  type ProxyContext,
} from "@json-rpc-snoop/core";
import { classifyPacket, delay, dropDelayMs } from "./chaos.js";
import { buildOutboundRequest, splitRequestTarget } from "./forwarder.js";
import type { Presenter } from "./presenter.js";
import { retrieveResponse, type UpstreamSender } from "./retriever.js";
import { buildRpcModulesResponse, isRpcModulesCall } from "./rpc-modules.js";
import { decideSuppression, planLog } from "./suppression.js";
import type { ForwardedResponse, InboundRequest, Rendered } from "./types.js";

export interface ExchangeDeps {
  context: ProxyContext;
  presenter: Presenter;
  /** Defaults to a plain HTTP/HTTPS request */
  send?: UpstreamSender | undefined;
  /** Used for drop delays */
  sleep?: ((ms: number) => Promise<void>) | undefined;
}

/** Where a returned response came from */
export type ResponseSource = "upstream" | "override" | "error";

export type ExchangeOutcome =
  | { kind: "respond"; source: ResponseSource; response: ForwardedResponse }
  | { kind: "dropped"; packet: PacketType };

interface ExchangeState {
  requestCall: JsonRpcCall | null;
  requestPath: string;
  requestType: PacketType;
  responseType: PacketType;
}

/** Synthesized 500 response for a failed phase */
export function failureResponse(
  phase: FailurePhase,
  error: unknown,
  host?: string
): Rendered<ForwardedResponse> {
  const json = JSON.stringify(toRpcErrorResponse(phase, error, host), null, 2);
  return {
    message: {
      status: 500,
      headers: [["content-type", "application/json"]],
      body: Buffer.from(json, "utf8"),
    },
    displayJson: json,
  };
}

function logDirection(
  direction: Direction,
  state: ExchangeState,
  deps: ExchangeDeps,
  json: string,
  headers: HeaderSnapshot,
  status?: number
): void {
  const decision = decideSuppression(
    { direction, ...state },
    deps.context.config
  );
  const plan = planLog(direction, json, decision, state.requestPath);

  switch (plan.kind) {
    case "skip":
      return;
    case "log":
      deps.presenter.packet({
        packet: direction === "request" ? state.requestType : state.responseType,
        json,
        body: plan.body,
        label: plan.label,
        headers,
        status,
      });
  }
}

/** A JSON body that is not a JSON-RPC call cannot match method rules */
function shouldWarnShapeMismatch(
  displayJson: string,
  requestCall: JsonRpcCall | null,
  deps: ExchangeDeps
): boolean {
  if (requestCall !== null || deps.context.config.suppressMethods.size === 0) {
    return false;
  }
  const decoded = decodeJson(displayJson);
  return decoded.ok && decoded.value !== null;
}

export async function handleExchange(
  inbound: InboundRequest,
  deps: ExchangeDeps
): Promise<ExchangeOutcome> {
  const { context, presenter } = deps;
  const { config } = context;
  const sleep = deps.sleep ?? delay;
  const requestPath = splitRequestTarget(inbound.url).path;

  let outbound: ReturnType<typeof buildOutboundRequest>;
  try {
    outbound = buildOutboundRequest(inbound, config);
  } catch (error) {
    const failure = failureResponse("processing request", error);
    presenter.failure(failure.displayJson, failure.message.status);
    return { kind: "respond", source: "error", response: failure.message };
  }

  const requestCall = parseJsonRpcCall(outbound.displayJson);
  if (shouldWarnShapeMismatch(outbound.displayJson, requestCall, deps)) {
    presenter.warning(
      `request to ${requestPath} is not a JSON-RPC call; method rules skipped`
    );
  }

  // Both directions are classified up front: a drop in either one
  // disables suppression for the whole exchange.
  const requestType = await classifyPacket("request", context);
  const responseType = await classifyPacket("response", context);
  const state: ExchangeState = {
    requestCall,
    requestPath,
    requestType,
    responseType,
  };

  logDirection(
    "request",
    state,
    deps,
    outbound.displayJson,
    outbound.message.headers
  );

  if (requestType.kind === "request-dropped") {
    await sleep(dropDelayMs(requestType));
    return { kind: "dropped", packet: requestType };
  }

  let retrieved: Rendered<ForwardedResponse>;
  let source: ResponseSource;
  if (config.rpcModulesOverride !== null && isRpcModulesCall(requestCall)) {
    retrieved = buildRpcModulesResponse(config.rpcModulesOverride);
    source = "override";
  } else {
    try {
      retrieved = await retrieveResponse(outbound.message, deps.send);
      source = "upstream";
    } catch (error) {
      retrieved = failureResponse(
        "processing response",
        error,
        config.destinationHost
      );
      source = "error";
    }
  }

  logDirection(
    "response",
    state,
    deps,
    retrieved.displayJson,
    retrieved.message.headers,
    retrieved.message.status
  );

  if (responseType.kind === "response-dropped") {
    await sleep(dropDelayMs(responseType));
    return { kind: "dropped", packet: responseType };
  }

  return { kind: "respond", source, response: retrieved.message };
}
