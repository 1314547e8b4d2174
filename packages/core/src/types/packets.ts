/**
 * Per-exchange packet classification and suppression types.
 */

/** Traffic direction within one exchange */
export type Direction = "request" | "response";

/** Direction plus drop status. Dropped variants carry the injected delay. */
export type PacketType =
  | { kind: "request" }
  | { kind: "response" }
  | { kind: "request-dropped"; delaySeconds: number }
  | { kind: "response-dropped"; delaySeconds: number };

/** Which direction(s) a suppression rule applies to */
export type SuppressScope = "request" | "response" | "all";

/** Suppression rule attached to a method name or request path */
export interface SuppressRule {
  /** <0 suppress entirely, 0 header line only, >0 at most N body lines */
  lines: number;
  scope: SuppressScope;
}

/** Outcome of a matched suppression rule */
export interface SuppressDecision {
  lineLimit: number;
  /** Suffix shown on the log line in place of the request path */
  label: string;
}

/** Ordered (name, value) header pairs copied at decision time */
export type HeaderSnapshot = ReadonlyArray<readonly [name: string, value: string]>;

export function isDropped(packet: PacketType): boolean {
  return packet.kind === "request-dropped" || packet.kind === "response-dropped";
}

/** Label printed on the log line for a packet */
export function packetLabel(packet: PacketType): string {
  switch (packet.kind) {
    case "request":
      return "REQUEST";
    case "response":
      return "RESPONSE";
    case "request-dropped":
      return "DROPPED REQUEST";
    case "response-dropped":
      return "DROPPED RESPONSE";
  }
}

/** Check whether a rule scope covers the given direction */
export function scopeCovers(scope: SuppressScope, direction: Direction): boolean {
  return scope === "all" || scope === direction;
}
