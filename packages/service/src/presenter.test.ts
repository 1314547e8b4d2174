import { describe, it, expect } from "vitest";
import { Presenter, type PacketEntry } from "./presenter.js";

const NOW = new Date(2026, 2, 7, 9, 5, 3, 7);
const STAMP = "Mar  7 09:05:03.007 2026";

const CYAN = "\u001b[36m";
const GREEN = "\u001b[32m";
const RED = "\u001b[31m";
const GRAY = "\u001b[90m";
const RESET = "\u001b[39m";

function stripColors(text: string): string {
  return text.replace(/\u001b\[[0-9;]*m/g, "");
}

function presenter(color: boolean, logHeaders = false): Presenter {
  return new Presenter({ color, logHeaders, now: () => NOW, write: () => {} });
}

const requestEntry: PacketEntry = {
  packet: { kind: "request" },
  json: '{\n  "id": 1\n}',
  body: '{\n  "id": 1\n}',
  label: "/rpc",
  headers: [
    ["Host", "node.test:8545"],
    ["Content-Type", "application/json"],
  ],
};

const errorJson =
  '{\n  "id": 1,\n  "jsonrpc": "2.0",\n  "error": {\n    "code": -32000,\n    "message": "boom"\n  }\n}';

describe("Presenter.format", () => {
  it("prints header line and body without colors", () => {
    expect(presenter(false).format(requestEntry)).toBe(
      `${STAMP} REQUEST /rpc\n{\n  "id": 1\n}\n`
    );
  });

  it("colors every body line separately", () => {
    expect(presenter(true).format(requestEntry)).toBe(
      `${STAMP} REQUEST /rpc\n${CYAN}{${RESET}\n${CYAN}  "id": 1${RESET}\n${CYAN}}${RESET}\n`
    );
  });

  it("omits a root path label", () => {
    expect(presenter(false).format({ ...requestEntry, label: "/" })).toBe(
      `${STAMP} REQUEST\n{\n  "id": 1\n}\n`
    );
  });

  it("prints the header line only when the body is omitted", () => {
    expect(
      presenter(true).format({
        ...requestEntry,
        body: null,
        label: "[method eth_call]",
      })
    ).toBe(`${STAMP} REQUEST [method eth_call]\n`);
  });

  it("adds status for responses", () => {
    const output = presenter(true).format({
      packet: { kind: "response" },
      json: '"0x1"',
      body: '"0x1"',
      label: "",
      headers: [],
      status: 200,
    });
    expect(output).toBe(`${STAMP} RESPONSE (status 200)\n${GREEN}"0x1"${RESET}\n`);
  });

  it("uses the error color for JSON-RPC error responses", () => {
    const output = presenter(true).format({
      packet: { kind: "response" },
      json: errorJson,
      body: "{\n...",
      label: "",
      headers: [],
      status: 200,
    });
    expect(output).toBe(
      `${STAMP} RESPONSE (status 200)\n${RED}{${RESET}\n${RED}...${RESET}\n`
    );
  });

  it("mutes dropped packets whatever their content", () => {
    const output = presenter(true).format({
      packet: { kind: "response-dropped", delaySeconds: 12 },
      json: errorJson,
      body: "{}",
      label: "",
      headers: [],
      status: 500,
    });
    expect(output).toBe(
      `${STAMP} DROPPED RESPONSE (status 500)\n${GRAY}{}${RESET}\n`
    );
  });

  it("lists headers when enabled", () => {
    expect(presenter(false, true).format(requestEntry)).toBe(
      `${STAMP} REQUEST /rpc\n` +
        "  headers:\n" +
        "    Host: node.test:8545\n" +
        "    Content-Type: application/json\n" +
        '{\n  "id": 1\n}\n'
    );
  });

  it("skips the headers block for an empty snapshot", () => {
    expect(
      presenter(false, true).format({ ...requestEntry, headers: [] })
    ).toBe(`${STAMP} REQUEST /rpc\n{\n  "id": 1\n}\n`);
  });

  it("matches the colored output with escapes stripped", () => {
    const entries: PacketEntry[] = [
      requestEntry,
      {
        packet: { kind: "request-dropped", delaySeconds: 1 },
        json: "null",
        body: "null",
        label: "/x",
        headers: [["a", "b"]],
      },
      {
        packet: { kind: "response" },
        json: errorJson,
        body: errorJson,
        label: "",
        headers: [["content-type", "application/json"]],
        status: 502,
      },
    ];

    for (const entry of entries) {
      expect(presenter(false, true).format(entry)).toBe(
        stripColors(presenter(true, true).format(entry))
      );
    }
    expect(presenter(false).formatFailure(errorJson, 500)).toBe(
      stripColors(presenter(true).formatFailure(errorJson, 500))
    );
  });
});

describe("Presenter output", () => {
  it("writes packets, failures and warnings to the sink", () => {
    const written: string[] = [];
    const sink = new Presenter({
      color: false,
      logHeaders: false,
      now: () => NOW,
      write: (text) => written.push(text),
    });

    sink.packet({ ...requestEntry, body: null });
    sink.failure('{"id":1}', 500);
    sink.warning("odd body");

    expect(written).toEqual([
      `${STAMP} REQUEST /rpc\n`,
      `${STAMP} ERROR (status 500)\n{"id":1}\n`,
      `${STAMP} WARNING odd body\n`,
    ]);
  });
});
