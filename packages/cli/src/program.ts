/**
 * Command-line definition for json-rpc-snoop.
 */

import { Command, InvalidArgumentError } from "commander";
import {
  ConfigError,
  DEFAULT_BIND_ADDRESS,
  DEFAULT_DROP_DELAY_SECONDS,
  DEFAULT_PORT,
  DEFAULT_RPC_MODULES,
  parseEndpoint,
  parseSuppressValue,
  resolveConfig,
  type ConfigInput,
  type ProxyConfig,
  type SuppressEntry,
} from "@json-rpc-snoop/core";

export const VERSION = "0.3.0";

const SUPPRESS_HELP = `
LINES=n specifies the degree of suppression:
    n < 0 Ignore message completely and log nothing [default]
    n = 0 Log that message occurred, but don't print any JSON
    n > 0 Log at most n lines of JSON
TYPE is one of:
    REQUEST:  Suppress request log
    RESPONSE: Suppress response log
    ALL:      Suppress both logs [default]

Environment:
    SNOOP_BIND_ADDRESS, SNOOP_PORT, SNOOP_DROP_DELAY, SNOOP_SEED
        Defaults for the matching options
    NO_COLOR
        Disable terminal colors when set to a non-empty value`;

/** Options as commander hands them to the action */
export interface CliOptions {
  bindAddress?: string;
  port?: number;
  logHeaders?: boolean;
  /** false when --no-color is given */
  color: boolean;
  suppressMethod: SuppressEntry[];
  suppressPath: SuppressEntry[];
  dropRequestRate: number;
  dropResponseRate: number;
  dropDelay?: number;
  seed?: number;
  fixGethAttach?: boolean;
  rpcModulesOverride: string[];
}

function parseInteger(value: string): number {
  if (!/^[+-]?\d+$/.test(value)) {
    throw new InvalidArgumentError("Not an integer.");
  }
  return parseInt(value, 10);
}

function parsePercent(value: string): number {
  const percent = parseInteger(value);
  if (percent < 0 || percent > 100) {
    throw new InvalidArgumentError("Must be between 0 and 100.");
  }
  return percent;
}

function parseSeconds(value: string): number {
  const seconds = Number(value);
  if (value.trim().length === 0 || !Number.isFinite(seconds) || seconds < 0) {
    throw new InvalidArgumentError("Must be a non-negative number.");
  }
  return seconds;
}

function collectSuppress(
  value: string,
  previous: SuppressEntry[]
): SuppressEntry[] {
  try {
    return [...previous, parseSuppressValue(value)];
  } catch (error) {
    if (error instanceof ConfigError) {
      throw new InvalidArgumentError(error.message);
    }
    throw error;
  }
}

function collectString(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function validateEndpoint(value: string): string {
  try {
    parseEndpoint(value);
  } catch (error) {
    if (error instanceof ConfigError) {
      throw new InvalidArgumentError(error.message);
    }
    throw error;
  }
  return value;
}

/** Map parsed command-line options onto config input */
export function toConfigInput(endpoint: string, options: CliOptions): ConfigInput {
  return {
    endpoint,
    bindAddress: options.bindAddress,
    port: options.port,
    logHeaders: options.logHeaders,
    // Only an explicit --no-color overrides the NO_COLOR environment check
    color: options.color ? undefined : false,
    suppressMethods: options.suppressMethod,
    suppressPaths: options.suppressPath,
    dropRequestRate: options.dropRequestRate,
    dropResponseRate: options.dropResponseRate,
    dropDelaySeconds: options.dropDelay,
    fixGethAttach: options.fixGethAttach,
    rpcModules: options.rpcModulesOverride,
    seed: options.seed,
  };
}

/**
 * Build the command. `run` receives the resolved configuration.
 */
export function createProgram(
  run: (config: ProxyConfig) => Promise<void>,
  env: NodeJS.ProcessEnv = process.env
): Command {
  const program = new Command();

  program
    .name("json-rpc-snoop")
    .description(
      "Proxies an http JSON-RPC endpoint and dumps requests and responses to screen"
    )
    .version(VERSION)
    .argument(
      "<RPC_ENDPOINT>",
      "JSON-RPC endpoint to forward incoming requests",
      validateEndpoint
    )
    .option(
      "-b, --bind-address <address>",
      `Address to bind to and listen for incoming requests (default: ${DEFAULT_BIND_ADDRESS})`
    )
    .option(
      "-p, --port <port>",
      `Port to listen for incoming requests (default: ${DEFAULT_PORT})`,
      parseInteger
    )
    .option(
      "-l, --log-headers",
      "Print the headers in addition to request/response"
    )
    .option("-n, --no-color", "Do not use terminal colors in output")
    .option(
      "-s, --suppress-method <METHOD[:LINES][:TYPE]>",
      "Suppress output of JSON RPC calls of this METHOD (can specify more than once)",
      collectSuppress,
      []
    )
    .option(
      "-S, --suppress-path <PATH[:LINES][:TYPE]>",
      "Suppress output of requests to the endpoint with this PATH (can specify more than once)",
      collectSuppress,
      []
    )
    .option(
      "--drop-request-rate <percent>",
      "Odds of randomly dropping a request for chaos testing [0..100]",
      parsePercent,
      0
    )
    .option(
      "--drop-response-rate <percent>",
      "Odds of randomly dropping a response for chaos testing [0..100]",
      parsePercent,
      0
    )
    .option(
      "--drop-delay <seconds>",
      `Seconds to hold a dropped packet before closing the connection (default: ${DEFAULT_DROP_DELAY_SECONDS})`,
      parseSeconds
    )
    .option("--seed <n>", "Seed for the drop decision generator", parseInteger)
    .option(
      "-f, --fix-geth-attach",
      "Override the results of the `rpc_modules` method. Useful for attaching a geth console to endpoints that don't support `rpc_modules`"
    )
    .option(
      "-r, --rpc-modules-override <module>",
      `Module to return from \`rpc_modules\`, requires -f (can specify more than once, default: ${DEFAULT_RPC_MODULES.join(",")})`,
      collectString,
      []
    )
    .addHelpText("after", SUPPRESS_HELP)
    .action(async (endpoint: string, options: CliOptions) => {
      let config: ProxyConfig;
      try {
        config = resolveConfig(toConfigInput(endpoint, options), env);
      } catch (error) {
        if (error instanceof ConfigError) {
          program.error(`error: ${error.message}`);
        }
        throw error;
      }
      await run(config);
    });

  return program;
}
