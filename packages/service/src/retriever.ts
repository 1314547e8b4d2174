/**
 * Sends the outbound request upstream and buffers the whole response.
 * node:http or node:https is picked from the URL scheme. Nothing is added
 * to the forwarded headers and the response bytes are kept as received.
 */

import * as http from "node:http";
import * as https from "node:https";
import {
  SnoopError,
  renderDisplayJson,
  type HeaderSnapshot,
} from "@json-rpc-snoop/core";
import { pairRawHeaders } from "./forwarder.js";
import type { ForwardedResponse, OutboundRequest, Rendered } from "./types.js";

/** Hop-by-hop and framing headers; the client request frames the body itself */
const TRANSPORT_MANAGED_HEADERS = new Set([
  "connection",
  "keep-alive",
  "proxy-connection",
  "transfer-encoding",
  "upgrade",
  "expect",
  "content-length",
]);

/** Methods that never carry a request body */
const BODYLESS_METHODS = new Set(["GET", "HEAD"]);

/** Performs one upstream round trip */
export type UpstreamSender = (
  request: OutboundRequest
) => Promise<ForwardedResponse>;

/** Repeated names become one multi-value entry, spelled as first seen */
function toOutgoingHeaders(headers: HeaderSnapshot): http.OutgoingHttpHeaders {
  const grouped = new Map<string, { name: string; values: string[] }>();

  for (const [name, value] of headers) {
    const key = name.toLowerCase();
    if (TRANSPORT_MANAGED_HEADERS.has(key)) continue;

    const existing = grouped.get(key);
    if (existing) {
      existing.values.push(value);
    } else {
      grouped.set(key, { name, values: [value] });
    }
  }

  const outgoing: http.OutgoingHttpHeaders = {};
  for (const { name, values } of grouped.values()) {
    outgoing[name] = values.length === 1 ? values[0] : values;
  }
  return outgoing;
}

/** Plain HTTP/HTTPS round trip */
export function sendUpstream(
  request: OutboundRequest
): Promise<ForwardedResponse> {
  const url = new URL(request.url);
  const options: http.RequestOptions = {
    method: request.method,
    headers: toOutgoingHeaders(request.headers),
  };

  return new Promise((resolve, reject) => {
    let responseStarted = false;

    const onResponse = (response: http.IncomingMessage) => {
      responseStarted = true;
      const chunks: Buffer[] = [];

      response.on("data", (chunk: Buffer) => {
        chunks.push(chunk);
      });
      response.on("end", () => {
        resolve({
          status: response.statusCode ?? 502,
          headers: pairRawHeaders(response.rawHeaders),
          body: Buffer.concat(chunks),
        });
      });
      response.on("error", (error) => {
        reject(new SnoopError("read", error.message, { cause: error }));
      });
    };

    const upstream =
      url.protocol === "https:"
        ? https.request(url, options, onResponse)
        : http.request(url, options, onResponse);

    upstream.on("error", (error) => {
      const kind = responseStarted ? "read" : "transport";
      reject(new SnoopError(kind, error.message, { cause: error }));
    });

    const sendBody =
      !BODYLESS_METHODS.has(request.method.toUpperCase()) &&
      request.body.length > 0;
    if (sendBody) {
      upstream.end(request.body);
    } else {
      upstream.end();
    }
  });
}

/** Send the request and render the upstream response for display */
export async function retrieveResponse(
  request: OutboundRequest,
  send: UpstreamSender = sendUpstream
): Promise<Rendered<ForwardedResponse>> {
  let response: ForwardedResponse;
  try {
    response = await send(request);
  } catch (error) {
    if (error instanceof SnoopError) {
      throw error;
    }
    throw new SnoopError(
      "transport",
      error instanceof Error ? error.message : String(error),
      { cause: error }
    );
  }

  return {
    message: response,
    displayJson: renderDisplayJson(response.body),
  };
}
