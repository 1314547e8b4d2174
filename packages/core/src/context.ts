/**
 * Process-wide proxy context: frozen configuration plus the one shared
 * random source. Built once at startup and handed to every exchange.
 */

import type { ProxyConfig } from "./config.js";
import {
  Mutex,
  SeededRandom,
  createSeed,
  type RandomSource,
} from "./random.js";

export class ProxyContext {
  readonly config: ProxyConfig;
  private readonly random: RandomSource;
  private readonly randomLock = new Mutex();
  private draws = 0;

  constructor(config: ProxyConfig, random?: RandomSource) {
    this.config = config;
    this.random = random ?? new SeededRandom(config.seed ?? createSeed());
  }

  /** Draw one uniform value in [0, 1). The lock is held for the draw only. */
  async draw(): Promise<number> {
    return this.randomLock.runExclusive(() => {
      this.draws++;
      return this.random.next();
    });
  }

  /** Number of values drawn so far */
  get drawCount(): number {
    return this.draws;
  }
}
