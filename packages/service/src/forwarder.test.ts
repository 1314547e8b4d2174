import { describe, it, expect } from "vitest";
import { SnoopError, resolveConfig } from "@json-rpc-snoop/core";
import {
  buildForwardHeaders,
  buildOutboundRequest,
  composeDestination,
  removeTrailingSlashes,
} from "./forwarder.js";

describe("composeDestination", () => {
  it("uses the endpoint unchanged for a bare slash", () => {
    expect(composeDestination("http://h:1234", "/")).toBe("http://h:1234");
    expect(composeDestination("http://h:1234/rpc/", "/")).toBe(
      "http://h:1234/rpc/"
    );
  });

  it("appends path and query after stripping trailing slashes", () => {
    expect(composeDestination("http://h:1234/", "/foo?x=1")).toBe(
      "http://h:1234/foo?x=1"
    );
    expect(composeDestination("https://h/api//", "/v1/rpc")).toBe(
      "https://h/api/v1/rpc"
    );
  });

  it("keeps an empty query on the root path", () => {
    expect(composeDestination("http://h:1234", "/?")).toBe("http://h:1234/?");
  });
});

describe("removeTrailingSlashes", () => {
  it("removes every trailing slash", () => {
    expect(removeTrailingSlashes("http://h///")).toBe("http://h");
    expect(removeTrailingSlashes("http://h")).toBe("http://h");
  });
});

describe("buildForwardHeaders", () => {
  it("drops accept-encoding and rewrites host, preserving order", () => {
    const headers = buildForwardHeaders(
      [
        ["Host", "localhost:3000"],
        ["Accept-Encoding", "gzip, br"],
        ["Content-Type", "application/json"],
        ["Authorization", "Bearer test-secret"],
      ],
      "node.test:8545"
    );

    expect(headers).toEqual([
      ["Host", "node.test:8545"],
      ["Content-Type", "application/json"],
      ["Authorization", "Bearer test-secret"],
    ]);
  });

  it("rejects header values that cannot be sent", () => {
    expect(() =>
      buildForwardHeaders([["X-Note", "caf\u0100"]], "node.test")
    ).toThrow(SnoopError);
    expect(() =>
      buildForwardHeaders([["X-Note", "a\r\nb"]], "node.test")
    ).toThrow("invalid value for header X-Note");
  });

  it("rejects invalid header names", () => {
    expect(() => buildForwardHeaders([["Bad Name", "x"]], "node.test")).toThrow(
      SnoopError
    );
  });
});

describe("buildOutboundRequest", () => {
  const config = resolveConfig({ endpoint: "http://node.test:8545" }, {});

  it("passes the body through and renders it", () => {
    const body = Buffer.from('{"id":1,"jsonrpc":"2.0","method":"net_version"}');
    const { message, displayJson } = buildOutboundRequest(
      {
        method: "POST",
        url: "/",
        headers: [["host", "127.0.0.1:3000"]],
        body,
      },
      config
    );

    expect(message.method).toBe("POST");
    expect(message.url).toBe("http://node.test:8545");
    expect(message.headers).toEqual([["host", "node.test:8545"]]);
    expect(message.body).toBe(body);
    expect(displayJson).toBe(
      '{\n  "id": 1,\n  "jsonrpc": "2.0",\n  "method": "net_version"\n}'
    );
  });

  it("renders an empty body as null", () => {
    const { displayJson } = buildOutboundRequest(
      { method: "GET", url: "/health", headers: [], body: Buffer.alloc(0) },
      config
    );
    expect(displayJson).toBe("null");
  });
});
