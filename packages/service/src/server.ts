/**
 * Fastify front end: accepts any method on any path, keeps the raw body
 * bytes, and writes the exchange outcome back to the client.
 */

import Fastify, {
  type FastifyInstance,
  type FastifyReply,
  type FastifyRequest,
} from "fastify";
import type { HeaderSnapshot, ProxyContext } from "@json-rpc-snoop/core";
import {
  failureResponse,
  handleExchange,
  type ExchangeDeps,
  type ExchangeOutcome,
} from "./exchange.js";
import { pairRawHeaders } from "./forwarder.js";
import { Presenter } from "./presenter.js";
import type { UpstreamSender } from "./retriever.js";
import type { ForwardedResponse, InboundRequest } from "./types.js";

/** Largest request body accepted from clients */
const BODY_LIMIT_BYTES = 64 * 1024 * 1024;

/** Hop-by-hop response headers; Fastify frames the buffered body itself */
const SKIP_RESPONSE_HEADERS = new Set([
  "transfer-encoding",
  "connection",
  "keep-alive",
]);

export interface ProxyServerOptions {
  context: ProxyContext;
  /** Defaults to a stdout presenter built from the context config */
  presenter?: Presenter | undefined;
  /** Defaults to a plain HTTP/HTTPS request */
  send?: UpstreamSender | undefined;
  sleep?: ((ms: number) => Promise<void>) | undefined;
}

export interface CreateProxyServerResult {
  app: FastifyInstance;
  /** Listen on the configured address; resolves to the bound URL */
  start: () => Promise<string>;
  close: () => Promise<void>;
}

/** Group repeated headers so every value reaches the client */
function groupHeaders(
  headers: HeaderSnapshot
): Record<string, string | string[]> {
  const grouped: Record<string, string | string[]> = {};

  for (const [name, value] of headers) {
    const key = name.toLowerCase();
    if (SKIP_RESPONSE_HEADERS.has(key)) continue;

    const existing = grouped[key];
    if (existing === undefined) {
      grouped[key] = value;
    } else if (Array.isArray(existing)) {
      existing.push(value);
    } else {
      grouped[key] = [existing, value];
    }
  }

  return grouped;
}

function sendResponse(
  reply: FastifyReply,
  response: ForwardedResponse
): FastifyReply {
  return reply
    .code(response.status)
    .headers(groupHeaders(response.headers))
    .send(response.body);
}

/**
 * Create the proxy server.
 */
export async function createProxyServer(
  options: ProxyServerOptions
): Promise<CreateProxyServerResult> {
  const { context } = options;
  const { config } = context;

  const deps: ExchangeDeps = {
    context,
    presenter:
      options.presenter ??
      new Presenter({ color: config.color, logHeaders: config.logHeaders }),
    send: options.send,
    sleep: options.sleep,
  };

  const app = Fastify({
    logger: false,
    exposeHeadRoutes: false,
    bodyLimit: BODY_LIMIT_BYTES,
  });

  // Bodies are forwarded byte-for-byte, whatever their content type
  app.removeAllContentTypeParsers();
  app.addContentTypeParser(
    "*",
    { parseAs: "buffer" },
    async (_request: FastifyRequest, body: Buffer) => body
  );

  const handler = async (request: FastifyRequest, reply: FastifyReply) => {
    const inbound: InboundRequest = {
      method: request.method,
      url: request.url,
      headers: pairRawHeaders(request.raw.rawHeaders),
      body: Buffer.isBuffer(request.body) ? request.body : Buffer.alloc(0),
    };

    let outcome: ExchangeOutcome;
    try {
      outcome = await handleExchange(inbound, deps);
    } catch (error) {
      console.error("Unexpected failure while handling exchange:", error);
      const failure = failureResponse("processing request", error);
      return sendResponse(reply, failure.message);
    }

    switch (outcome.kind) {
      case "respond":
        return sendResponse(reply, outcome.response);
      case "dropped":
        // No reply at all: the client sees the connection go away
        reply.hijack();
        reply.raw.destroy();
        return reply;
    }
  };

  app.all("/", handler);
  app.all("/*", handler);

  const start = async () => {
    const address = await app.listen({
      port: config.port,
      host: config.bindAddress,
    });
    console.log(`Proxying ${address} -> ${config.destination}`);
    return address;
  };

  const close = async () => {
    await app.close();
  };

  return { app, start, close };
}
