/**
 * Builds the upstream request from the inbound one.
 */

import {
  SnoopError,
  renderDisplayJson,
  type HeaderSnapshot,
  type ProxyConfig,
} from "@json-rpc-snoop/core";
import type { InboundRequest, OutboundRequest, Rendered } from "./types.js";

const HEADER_NAME_PATTERN = /^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/;
/** CR, LF, NUL or anything outside Latin-1 */
const INVALID_HEADER_VALUE_PATTERN = /[\r\n\0]|[^\u0000-\u00ff]/;

/** Pair up Node's flat [name, value, name, value, ...] raw header list */
export function pairRawHeaders(rawHeaders: readonly string[]): HeaderSnapshot {
  const pairs: [string, string][] = [];
  for (let i = 0; i + 1 < rawHeaders.length; i += 2) {
    const name = rawHeaders[i];
    const value = rawHeaders[i + 1];
    if (name !== undefined && value !== undefined) {
      pairs.push([name, value]);
    }
  }
  return pairs;
}

/** Strip every trailing slash from a URL string */
export function removeTrailingSlashes(url: string): string {
  return url.replace(/\/+$/, "");
}

/** Split a request target into path and optional query */
export function splitRequestTarget(target: string): {
  path: string;
  query: string | null;
} {
  const queryIndex = target.indexOf("?");
  if (queryIndex === -1) {
    return { path: target, query: null };
  }
  return {
    path: target.slice(0, queryIndex),
    query: target.slice(queryIndex + 1),
  };
}

/**
 * Destination for an inbound request target.
 * A bare "/" maps to the configured endpoint unchanged; anything else is
 * appended to it with trailing slashes removed.
 */
export function composeDestination(base: string, target: string): string {
  const { path, query } = splitRequestTarget(target);

  if (path === "/" && query === null) {
    return base;
  }

  let destination = removeTrailingSlashes(base) + path;
  if (query !== null) {
    destination += `?${query}`;
  }

  try {
    new URL(destination);
  } catch (error) {
    throw new SnoopError(
      "construction",
      `invalid destination URI ${JSON.stringify(destination)}`,
      { cause: error }
    );
  }

  return destination;
}

/**
 * Copy headers for the upstream request.
 * accept-encoding is dropped so upstream answers uncompressed; host is
 * rewritten to the destination.
 */
export function buildForwardHeaders(
  headers: HeaderSnapshot,
  destinationHost: string
): HeaderSnapshot {
  const forwarded: [string, string][] = [];

  for (const [name, value] of headers) {
    const lowerName = name.toLowerCase();

    if (lowerName === "accept-encoding") {
      continue;
    }

    const forwardedValue = lowerName === "host" ? destinationHost : value;

    if (!HEADER_NAME_PATTERN.test(name)) {
      throw new SnoopError(
        "construction",
        `invalid header name ${JSON.stringify(name)}`
      );
    }
    if (INVALID_HEADER_VALUE_PATTERN.test(forwardedValue)) {
      throw new SnoopError("construction", `invalid value for header ${name}`);
    }

    forwarded.push([name, forwardedValue]);
  }

  return forwarded;
}

/** Build the outbound request and render the inbound body for display */
export function buildOutboundRequest(
  inbound: InboundRequest,
  config: ProxyConfig
): Rendered<OutboundRequest> {
  const displayJson = renderDisplayJson(inbound.body);

  const message: OutboundRequest = {
    method: inbound.method,
    url: composeDestination(config.destination, inbound.url),
    headers: buildForwardHeaders(inbound.headers, config.destinationHost),
    body: inbound.body,
  };

  return { message, displayJson };
}
