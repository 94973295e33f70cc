/**
 * Deterministic RNG with stream isolation.
 * Contract: derive sub-seeds from (run_seed, stream_key, day_index).
 * Never use Math.random() inside the sim.
 */

import type { RandomSource } from "./types";

function fnv1a32(str: string): number {
  let h = 0x811c9dc5; // 2166136261
  for (let i = 0; i < str.length; i++) {
    h ^= str.charCodeAt(i);
    h = Math.imul(h, 0x01000193); // 16777619
    h >>>= 0;
  }
  return h >>> 0;
}

class Mulberry32 {
  private a: number;
  constructor(seed: number) {
    this.a = seed >>> 0;
  }
  next(): number {
    this.a = (this.a + 0x6d2b79f5) >>> 0;
    let t = this.a;
    t = Math.imul(t ^ (t >>> 15), t | 1) >>> 0;
    t ^= (t + Math.imul(t ^ (t >>> 7), t | 61)) >>> 0;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }
}

// "timing" feeds inter-event delays, "selection" feeds event draws.
// The selection policy never shifts the clock.
export type StreamKey = "timing" | "selection";

export class Rng implements RandomSource {
  private gen: Mulberry32;

  constructor(
    public readonly runSeed: string,
    public readonly stream: StreamKey,
    public readonly dayIndex: number
  ) {
    const seed = fnv1a32(`${runSeed}|${stream}|${dayIndex}`);
    this.gen = new Mulberry32(seed);
  }

  next(): number {
    return this.gen.next();
  }
}
