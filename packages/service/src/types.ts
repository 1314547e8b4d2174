/**
 * Message shapes passed between pipeline stages.
 */

import type { HeaderSnapshot } from "@json-rpc-snoop/core";

/** Request as accepted from the client */
export interface InboundRequest {
  method: string;
  /** Path plus optional query, as received */
  url: string;
  headers: HeaderSnapshot;
  body: Buffer;
}

/** Request as it will be sent upstream */
export interface OutboundRequest {
  method: string;
  url: string;
  headers: HeaderSnapshot;
  body: Buffer;
}

/** Fully buffered response handed back to the client */
export interface ForwardedResponse {
  status: number;
  headers: HeaderSnapshot;
  body: Buffer;
}

/** A message together with its rendering for the terminal */
export interface Rendered<T> {
  message: T;
  displayJson: string;
}
