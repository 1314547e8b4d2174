export type {
  Direction,
  PacketType,
  SuppressScope,
  SuppressRule,
  SuppressDecision,
  HeaderSnapshot,
} from "./packets.js";
export {
  isDropped,
  packetLabel,
  scopeCovers,
} from "./packets.js";

export type {
  JsonRpcCall,
  JsonRpcErrorResponse,
  JsonRpcSuccessResponse,
} from "./jsonrpc.js";
