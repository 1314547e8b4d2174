/**
 * Tests for the upstream round trip, against a local Fastify upstream.
 */

import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { gzipSync } from "node:zlib";
import Fastify, { type FastifyInstance } from "fastify";
import { SnoopError } from "@json-rpc-snoop/core";
import {
  retrieveResponse,
  sendUpstream,
  type UpstreamSender,
} from "./retriever.js";
import type { OutboundRequest } from "./types.js";

const RESULT = '{"jsonrpc":"2.0","result":"0x1","id":1}';

interface Echo {
  headers: Record<string, string>;
  body?: unknown;
}

function readEcho(body: Buffer): Echo {
  return JSON.parse(body.toString("utf8"));
}

async function listenOnLoopback(app: FastifyInstance): Promise<string> {
  await app.listen({ port: 0, host: "127.0.0.1" });
  const address = app.server.address();
  const port = typeof address === "object" && address ? address.port : 0;
  return `127.0.0.1:${port}`;
}

describe("sendUpstream", () => {
  let upstream: FastifyInstance;
  let upstreamHost: string;

  beforeAll(async () => {
    upstream = Fastify({ logger: false });

    upstream.post("/echo", async (request) => ({
      headers: request.headers,
      body: request.body,
    }));

    upstream.get("/echo", async (request) => ({ headers: request.headers }));

    upstream.get("/gzip", async (_request, reply) => {
      return reply
        .header("content-type", "application/json")
        .header("content-encoding", "gzip")
        .send(gzipSync(RESULT));
    });

    upstream.get("/truncated", (_request, reply) => {
      reply.hijack();
      reply.raw.writeHead(200, { "content-length": "100" });
      reply.raw.write("partial", () => {
        reply.raw.destroy();
      });
    });

    upstreamHost = await listenOnLoopback(upstream);
  });

  afterAll(async () => {
    await upstream.close();
  });

  function outbound(overrides: Partial<OutboundRequest>): OutboundRequest {
    return {
      method: "POST",
      url: `http://${upstreamHost}/echo`,
      headers: [
        ["Host", upstreamHost],
        ["Content-Type", "application/json"],
      ],
      body: Buffer.from("{}"),
      ...overrides,
    };
  }

  it("sends only the given headers plus connection framing", async () => {
    const response = await sendUpstream(
      outbound({
        headers: [
          ["Host", upstreamHost],
          ["Content-Type", "application/json"],
          ["X-Trace", "abc"],
          ["Connection", "close"],
          ["Content-Length", "2"],
        ],
        body: Buffer.from('{"a":1}'),
      })
    );

    expect(response.status).toBe(200);
    const echoed = readEcho(response.body);
    expect(Object.keys(echoed.headers).sort()).toEqual([
      "connection",
      "content-length",
      "content-type",
      "host",
      "x-trace",
    ]);
    expect(echoed.headers["host"]).toBe(upstreamHost);
    expect(echoed.headers["x-trace"]).toBe("abc");
    expect(echoed.headers["content-length"]).toBe("7");
    expect(echoed.body).toEqual({ a: 1 });
  });

  it("sends no body for GET", async () => {
    const response = await sendUpstream(
      outbound({ method: "GET", body: Buffer.from("ignored") })
    );

    const echoed = readEcho(response.body);
    expect(echoed.headers["content-length"]).toBeUndefined();
    expect(echoed.headers["transfer-encoding"]).toBeUndefined();
  });

  it("returns encoded bodies and their headers as received", async () => {
    const response = await sendUpstream(
      outbound({
        method: "GET",
        url: `http://${upstreamHost}/gzip`,
        body: Buffer.alloc(0),
      })
    );

    expect(response.headers).toContainEqual(["content-encoding", "gzip"]);
    expect(response.body.equals(gzipSync(RESULT))).toBe(true);
  });

  it("reports refused connections as transport errors", async () => {
    const closed = Fastify({ logger: false });
    const closedHost = await listenOnLoopback(closed);
    await closed.close();

    const failure = await sendUpstream(
      outbound({ url: `http://${closedHost}/echo` })
    ).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(SnoopError);
    expect(failure).toMatchObject({ kind: "transport" });
    const cause = failure instanceof SnoopError ? failure.cause : null;
    expect(cause).toMatchObject({ code: "ECONNREFUSED" });
  });

  it("reports a cut-off response body as a read error", async () => {
    const failure = await sendUpstream(
      outbound({
        method: "GET",
        url: `http://${upstreamHost}/truncated`,
        body: Buffer.alloc(0),
      })
    ).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(SnoopError);
    expect(failure).toMatchObject({ kind: "read" });
  });
});

describe("retrieveResponse", () => {
  const request: OutboundRequest = {
    method: "POST",
    url: "http://node.test:8545",
    headers: [["Host", "node.test:8545"]],
    body: Buffer.from("{}"),
  };

  it("renders the response body for display", async () => {
    const send: UpstreamSender = async () => ({
      status: 200,
      headers: [["content-type", "application/json"]],
      body: Buffer.from(RESULT),
    });

    const result = await retrieveResponse(request, send);

    expect(result.message.status).toBe(200);
    expect(result.displayJson).toBe(
      '{\n  "jsonrpc": "2.0",\n  "result": "0x1",\n  "id": 1\n}'
    );
  });

  it("renders an empty body as null", async () => {
    const send: UpstreamSender = async () => ({
      status: 204,
      headers: [],
      body: Buffer.alloc(0),
    });

    const result = await retrieveResponse(request, send);

    expect(result.displayJson).toBe("null");
  });

  it("wraps other sender failures as transport errors", async () => {
    const refused = Object.assign(new Error("connect ECONNREFUSED"), {
      code: "ECONNREFUSED",
    });
    const send: UpstreamSender = async () => {
      throw refused;
    };

    const failure = await retrieveResponse(request, send).catch(
      (error: unknown) => error
    );

    expect(failure).toBeInstanceOf(SnoopError);
    expect(failure).toMatchObject({
      kind: "transport",
      message: "connect ECONNREFUSED",
      cause: refused,
    });
  });

  it("passes SnoopErrors through unchanged", async () => {
    const readFailure = new SnoopError("read", "aborted");
    const send: UpstreamSender = async () => {
      throw readFailure;
    };

    await expect(retrieveResponse(request, send)).rejects.toBe(readFailure);
  });
});
