export {
  decodeJson,
  prettyPrintOrRaw,
  renderDisplayJson,
  asJsonRpcCall,
  asJsonRpcErrorResponse,
  parseJsonRpcCall,
  isJsonRpcErrorResponse,
  type DecodeResult,
} from "./json.js";
export { createPalette, colorLines, type Palette } from "./colors.js";
export {
  SnoopError,
  describeFailure,
  toRpcErrorResponse,
  INTERNAL_ERROR_CODE,
  type FailurePhase,
  type SnoopErrorKind,
} from "./errors.js";
