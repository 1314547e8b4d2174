/**
 * Configuration management.
 * Turns parsed command-line options (with environment fallbacks) into an
 * immutable ProxyConfig shared by every exchange.
 */

import { isIP } from "node:net";
import type { SuppressRule, SuppressScope } from "./types/index.js";

/** Modules reported by the rpc_modules override when none are given */
export const DEFAULT_RPC_MODULES: readonly string[] = ["eth", "net", "web3"];

export const DEFAULT_BIND_ADDRESS = "127.0.0.1";
export const DEFAULT_PORT = 3000;
export const DEFAULT_DROP_DELAY_SECONDS = 12;

export interface ProxyConfig {
  /** Upstream endpoint every request is forwarded to */
  readonly destination: string;
  /** host[:port] of the destination, used to rewrite the Host header */
  readonly destinationHost: string;
  readonly bindAddress: string;
  readonly port: number;
  readonly suppressMethods: ReadonlyMap<string, SuppressRule>;
  readonly suppressPaths: ReadonlyMap<string, SuppressRule>;
  /** Modules reported for rpc_modules, or null when the override is off */
  readonly rpcModulesOverride: readonly string[] | null;
  /** Probability in [0,1] */
  readonly dropRequestRate: number;
  /** Probability in [0,1] */
  readonly dropResponseRate: number;
  readonly dropDelaySeconds: number;
  readonly logHeaders: boolean;
  readonly color: boolean;
  /** Seed for the shared random source; random when not set */
  readonly seed: number | null;
}

/** A `KEY[:LINES][:TYPE]` value after parsing */
export type SuppressEntry = readonly [key: string, rule: SuppressRule];

/** Options as collected from the command line */
export interface ConfigInput {
  endpoint: string;
  bindAddress?: string | undefined;
  port?: number | undefined;
  logHeaders?: boolean | undefined;
  color?: boolean | undefined;
  suppressMethods?: readonly SuppressEntry[] | undefined;
  suppressPaths?: readonly SuppressEntry[] | undefined;
  /** Integer percent 0..100 */
  dropRequestRate?: number | undefined;
  /** Integer percent 0..100 */
  dropResponseRate?: number | undefined;
  dropDelaySeconds?: number | undefined;
  fixGethAttach?: boolean | undefined;
  rpcModules?: readonly string[] | undefined;
  seed?: number | undefined;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const SUPPRESS_SCOPES: Record<string, SuppressScope> = {
  REQUEST: "request",
  RESPONSE: "response",
  ALL: "all",
};

const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Parse a `KEY[:LINES][:TYPE]` suppression value.
 * LINES defaults to -1 and TYPE (REQUEST, RESPONSE or ALL, any case) to ALL.
 */
export function parseSuppressValue(value: string): SuppressEntry {
  const parts = value.split(":");
  if (parts.length > 3) {
    throw new ConfigError(
      `Invalid suppress value "${value}": expected KEY[:LINES][:TYPE]`
    );
  }

  const [key = "", linesRaw, scopeRaw] = parts;
  if (key.length === 0) {
    throw new ConfigError(`Invalid suppress value "${value}": empty key`);
  }

  let lines = -1;
  if (linesRaw !== undefined && linesRaw.length > 0) {
    if (!INTEGER_PATTERN.test(linesRaw)) {
      throw new ConfigError(
        `Invalid suppress value "${value}": LINES must be an integer`
      );
    }
    lines = parseInt(linesRaw, 10);
  }

  let scope: SuppressScope = "all";
  if (scopeRaw !== undefined) {
    const matched = SUPPRESS_SCOPES[scopeRaw.toUpperCase()];
    if (matched === undefined) {
      throw new ConfigError(
        `Invalid suppress value "${value}": TYPE must be REQUEST, RESPONSE or ALL`
      );
    }
    scope = matched;
  }

  return [key, { lines, scope }];
}

/** Validate an RPC endpoint; only http and https are forwarded to */
export function parseEndpoint(endpoint: string): URL {
  let url: URL;
  try {
    url = new URL(endpoint);
  } catch {
    throw new ConfigError(`Invalid RPC endpoint "${endpoint}"`);
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new ConfigError(
      `Invalid RPC endpoint "${endpoint}": scheme must be http or https`
    );
  }
  return url;
}

function percentToRate(name: string, percent: number | undefined): number {
  const value = percent ?? 0;
  if (!Number.isInteger(value) || value < 0 || value > 100) {
    throw new ConfigError(`${name} must be an integer between 0 and 100`);
  }
  return value / 100;
}

function parseIntegerEnv(
  env: NodeJS.ProcessEnv,
  name: string
): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.length === 0) {
    return undefined;
  }
  if (!INTEGER_PATTERN.test(raw)) {
    throw new ConfigError(`${name} must be an integer, got "${raw}"`);
  }
  return parseInt(raw, 10);
}

function parseNumberEnv(
  env: NodeJS.ProcessEnv,
  name: string
): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.length === 0) {
    return undefined;
  }
  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw new ConfigError(`${name} must be a number, got "${raw}"`);
  }
  return value;
}

/**
 * Build the immutable proxy configuration.
 * Explicit options win over environment variables:
 *   SNOOP_BIND_ADDRESS, SNOOP_PORT, SNOOP_DROP_DELAY, SNOOP_SEED, NO_COLOR
 */
export function resolveConfig(
  input: ConfigInput,
  env: NodeJS.ProcessEnv = process.env
): ProxyConfig {
  const destinationUrl = parseEndpoint(input.endpoint);

  const bindAddress =
    input.bindAddress ?? env["SNOOP_BIND_ADDRESS"] ?? DEFAULT_BIND_ADDRESS;
  if (isIP(bindAddress) === 0) {
    throw new ConfigError(`Error parsing listen address "${bindAddress}"`);
  }

  const port = input.port ?? parseIntegerEnv(env, "SNOOP_PORT") ?? DEFAULT_PORT;
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigError(`Invalid port ${port}`);
  }

  const dropDelaySeconds =
    input.dropDelaySeconds ??
    parseNumberEnv(env, "SNOOP_DROP_DELAY") ??
    DEFAULT_DROP_DELAY_SECONDS;
  if (!Number.isFinite(dropDelaySeconds) || dropDelaySeconds < 0) {
    throw new ConfigError("Drop delay must be a non-negative number of seconds");
  }

  if (input.rpcModules !== undefined && input.rpcModules.length > 0) {
    if (!input.fixGethAttach) {
      throw new ConfigError("--rpc-modules-override requires --fix-geth-attach");
    }
  }

  let rpcModulesOverride: readonly string[] | null = null;
  if (input.fixGethAttach) {
    rpcModulesOverride = Object.freeze(
      input.rpcModules !== undefined && input.rpcModules.length > 0
        ? [...input.rpcModules]
        : [...DEFAULT_RPC_MODULES]
    );
  }

  const noColorEnv = env["NO_COLOR"];
  const color =
    input.color ?? !(noColorEnv !== undefined && noColorEnv.length > 0);

  const seed = input.seed ?? parseIntegerEnv(env, "SNOOP_SEED") ?? null;

  return Object.freeze({
    destination: input.endpoint,
    destinationHost: destinationUrl.host,
    bindAddress,
    port,
    suppressMethods: new Map(input.suppressMethods ?? []),
    suppressPaths: new Map(input.suppressPaths ?? []),
    rpcModulesOverride,
    dropRequestRate: percentToRate("Drop request rate", input.dropRequestRate),
    dropResponseRate: percentToRate(
      "Drop response rate",
      input.dropResponseRate
    ),
    dropDelaySeconds,
    logHeaders: input.logHeaders ?? false,
    color,
    seed,
  });
}
