#!/usr/bin/env -S node --import tsx
/**
 * @json-rpc-snoop/cli
 *
 * Usage:
 *   json-rpc-snoop [options] <RPC_ENDPOINT>
 *
 * Examples:
 *   # Watch everything sent to a local node
 *   json-rpc-snoop http://127.0.0.1:8545
 *
 *   # Hide eth_blockNumber polling, keep 10 lines of eth_getBlockByNumber replies
 *   json-rpc-snoop -s eth_blockNumber -s eth_getBlockByNumber:10:response http://127.0.0.1:8545
 *
 *   # Drop a quarter of all responses
 *   json-rpc-snoop --drop-response-rate 25 https://rpc.example.org
 */

import { installTimestampLogging } from "@json-rpc-snoop/core";
import { startProxy } from "@json-rpc-snoop/service";
import { createProgram } from "./program.js";

async function main(): Promise<void> {
  installTimestampLogging();

  const program = createProgram(async (config) => {
    try {
      await startProxy(config);
    } catch (error) {
      console.error(
        `Unable to bind to ${config.bindAddress}:${config.port}: ${
          error instanceof Error ? error.message : String(error)
        }`
      );
      process.exit(1);
    }
  });

  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error("Failed to start proxy:", error);
  process.exit(1);
});
