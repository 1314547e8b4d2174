/**
 * Seeded pseudo-random source shared by every exchange.
 */

import { randomInt } from "node:crypto";

/** FIFO async mutex */
export class Mutex {
  private locked = false;
  private queue: (() => void)[] = [];

  async acquire(): Promise<void> {
    if (!this.locked) {
      this.locked = true;
      return;
    }

    return new Promise((resolve) => {
      this.queue.push(resolve);
    });
  }

  release(): void {
    const next = this.queue.shift();
    if (next) {
      next();
    } else {
      this.locked = false;
    }
  }

  /** Run `fn` while holding the lock */
  async runExclusive<T>(fn: () => T): Promise<T> {
    await this.acquire();
    try {
      return fn();
    } finally {
      this.release();
    }
  }
}

/** Uniform generator over [0, 1) */
export interface RandomSource {
  next(): number;
}

/** Mulberry32: small 32-bit state generator, reproducible from its seed */
export class SeededRandom implements RandomSource {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  next(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }
}

/** Fresh seed from the OS entropy source */
export function createSeed(): number {
  return randomInt(0, 0x100000000);
}
