/**
 * Random packet dropping for client resilience testing.
 */

import type { Direction, PacketType, ProxyContext } from "@json-rpc-snoop/core";

/** Drop probability configured for a direction */
export function dropRateFor(direction: Direction, context: ProxyContext): number {
  return direction === "request"
    ? context.config.dropRequestRate
    : context.config.dropResponseRate;
}

function deliveredPacket(direction: Direction): PacketType {
  return direction === "request" ? { kind: "request" } : { kind: "response" };
}

/**
 * Classify one direction of an exchange.
 * A zero rate never touches the random source; otherwise exactly one value
 * is drawn and the packet drops when it is <= the rate.
 */
export async function classifyPacket(
  direction: Direction,
  context: ProxyContext
): Promise<PacketType> {
  const rate = dropRateFor(direction, context);
  const delaySeconds = context.config.dropDelaySeconds;

  if (rate === 0) {
    return deliveredPacket(direction);
  }

  const roll = await context.draw();
  if (roll > rate) {
    return deliveredPacket(direction);
  }

  return direction === "request"
    ? { kind: "request-dropped", delaySeconds }
    : { kind: "response-dropped", delaySeconds };
}

/** Injected delay in milliseconds; zero for packets that were not dropped */
export function dropDelayMs(packet: PacketType): number {
  switch (packet.kind) {
    case "request":
    case "response":
      return 0;
    case "request-dropped":
    case "response-dropped":
      return Math.round(packet.delaySeconds * 1000);
  }
}

/**
 * Create a delay promise.
 */
export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
