/**
 * Local answer for `rpc_modules`, for attaching a geth console to endpoints
 * that do not implement it.
 */

import type { JsonRpcCall, JsonRpcSuccessResponse } from "@json-rpc-snoop/core";
import type { ForwardedResponse, Rendered } from "./types.js";

export const RPC_MODULES_METHOD = "rpc_modules";

export function isRpcModulesCall(call: JsonRpcCall | null): boolean {
  return call !== null && call.method === RPC_MODULES_METHOD;
}

/** Status 200 response listing every module at version "1.0", in order */
export function buildRpcModulesResponse(
  modules: readonly string[]
): Rendered<ForwardedResponse> {
  const result: Record<string, string> = Object.fromEntries(
    modules.map((name) => [name, "1.0"])
  );

  const payload: JsonRpcSuccessResponse = { jsonrpc: "2.0", result, id: 1 };
  const json = JSON.stringify(payload, null, 2);

  return {
    message: {
      status: 200,
      headers: [["content-type", "application/json"]],
      body: Buffer.from(json, "utf8"),
    },
    displayJson: json,
  };
}
