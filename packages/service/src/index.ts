/**
 * @json-rpc-snoop/service
 *
 * Forwarding proxy that prints every JSON-RPC exchange to the terminal.
 */

import { ProxyContext, type ProxyConfig } from "@json-rpc-snoop/core";
import { createProxyServer } from "./server.js";

export { createProxyServer } from "./server.js";
export type {
  ProxyServerOptions,
  CreateProxyServerResult,
} from "./server.js";
export {
  handleExchange,
  failureResponse,
  type ExchangeDeps,
  type ExchangeOutcome,
  type ResponseSource,
} from "./exchange.js";
export { Presenter, type PresenterOptions, type PacketEntry } from "./presenter.js";
export {
  buildOutboundRequest,
  buildForwardHeaders,
  pairRawHeaders,
  composeDestination,
  removeTrailingSlashes,
  splitRequestTarget,
} from "./forwarder.js";
export {
  retrieveResponse,
  sendUpstream,
  type UpstreamSender,
} from "./retriever.js";
export { classifyPacket, dropDelayMs, dropRateFor, delay } from "./chaos.js";
export {
  decideSuppression,
  planLog,
  trimJson,
  type LogPlan,
  type SuppressionInput,
} from "./suppression.js";
export {
  buildRpcModulesResponse,
  isRpcModulesCall,
  RPC_MODULES_METHOD,
} from "./rpc-modules.js";
export type {
  InboundRequest,
  OutboundRequest,
  ForwardedResponse,
  Rendered,
} from "./types.js";

export interface ProxyHandle {
  address: string;
  shutdown: () => Promise<void>;
}

/**
 * Start the proxy with a resolved configuration.
 * Used by the CLI.
 */
export async function startProxy(config: ProxyConfig): Promise<ProxyHandle> {
  const context = new ProxyContext(config);
  const proxy = await createProxyServer({ context });
  const address = await proxy.start();

  const shutdown = async () => {
    await proxy.close();
  };

  const onSignal = () => {
    shutdown().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error("Failed to shut down cleanly:", error);
        process.exit(1);
      }
    );
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  return { address, shutdown };
}
