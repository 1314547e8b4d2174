/**
 * JSON-RPC shapes recognized for display and suppression.
 * Nothing here is enforced on the wire.
 */

/** JSON-RPC call as sent by clients */
export interface JsonRpcCall {
  id: number;
  jsonrpc: string;
  method: string;
  params?: unknown[];
}

/** JSON-RPC error response */
export interface JsonRpcErrorResponse {
  id: number;
  jsonrpc: string;
  error: {
    code: number;
    message: string;
  };
}

/** JSON-RPC success response */
export interface JsonRpcSuccessResponse {
  jsonrpc: string;
  result: unknown;
  id: number;
}
