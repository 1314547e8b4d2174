/**
 * @json-rpc-snoop/core
 *
 * Shared types, configuration, JSON sniffing and the seeded random source
 * for the JSON-RPC snooping proxy.
 */

export * from "./types/index.js";
export * from "./utils/index.js";
export {
  resolveConfig,
  parseSuppressValue,
  parseEndpoint,
  ConfigError,
  DEFAULT_RPC_MODULES,
  DEFAULT_BIND_ADDRESS,
  DEFAULT_PORT,
  DEFAULT_DROP_DELAY_SECONDS,
  type ProxyConfig,
  type ConfigInput,
  type SuppressEntry,
} from "./config.js";
export { ProxyContext } from "./context.js";
export {
  Mutex,
  SeededRandom,
  createSeed,
  type RandomSource,
} from "./random.js";
export { formatLocalTimestamp, installTimestampLogging } from "./logger.js";
