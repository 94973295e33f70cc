import type { ExpectedCounts, StationaryDistribution, StationaryResult } from "./types";
import { STATIONARY_DAMPING, STATIONARY_MAX_ITERATIONS, STATIONARY_TOLERANCE } from "./constants";
import { countOf, nameRecord } from "./util";

export interface StationaryOptions {
  tolerance?: number;
  maxIterations?: number;
  /** Weight kept from the previous vector on each step. 0 = plain power iteration. */
  damping?: number;
}

/**
 * Long-run event probabilities when an event may never follow itself.
 *
 * Markov chain over events: P(j -> i) = p_i / (1 - p_j) for i != j, P(j -> j) = 0.
 * Power iteration from the base distribution, renormalized each step. Steps are
 * lazy (s' = (1 - d) * sP + d * s), which keeps the fixed point but also settles
 * periodic chains: with two events the plain chain alternates forever.
 *
 * A row with 1 - p_j <= 0 sends no mass anywhere. If a whole step carries no
 * mass the current vector is returned unconverged. This freezes a certain event
 * instead of modelling it as a true absorbing state.
 */
export function stationaryNoRepeat(base: readonly number[], opts: StationaryOptions = {}): StationaryResult {
  const tol = opts.tolerance ?? STATIONARY_TOLERANCE;
  const maxIter = opts.maxIterations ?? STATIONARY_MAX_ITERATIONS;
  const damping = opts.damping ?? STATIONARY_DAMPING;
  const n = base.length;

  if (n <= 1) return { probabilities: base.slice(), iterations: 0, converged: true, maxDiff: 0 };

  let stationary = base.slice();
  let maxDiff = Infinity;

  for (let iter = 0; iter < maxIter; iter++) {
    const next = new Array<number>(n).fill(0);
    for (let j = 0; j < n; j++) {
      const den = 1 - base[j];
      if (den <= 0) continue;
      for (let i = 0; i < n; i++) {
        if (i === j) continue;
        next[i] += stationary[j] * (base[i] / den);
      }
    }

    const moved = next.reduce((s, v) => s + v, 0);
    if (moved === 0) return { probabilities: stationary, iterations: iter, converged: false, maxDiff };

    for (let i = 0; i < n; i++) next[i] = (1 - damping) * (next[i] / moved) + damping * stationary[i];
    const sumNext = next.reduce((s, v) => s + v, 0);
    for (let i = 0; i < n; i++) next[i] /= sumNext;

    maxDiff = 0;
    for (let i = 0; i < n; i++) maxDiff = Math.max(maxDiff, Math.abs(next[i] - stationary[i]));
    stationary = next;
    if (maxDiff < tol) return { probabilities: stationary, iterations: iter + 1, converged: true, maxDiff };
  }

  return { probabilities: stationary, iterations: maxIter, converged: false, maxDiff };
}

/** Keyed view; duplicate names add up. */
export function toDistribution(names: readonly string[], probabilities: readonly number[]): StationaryDistribution {
  const out: StationaryDistribution = nameRecord<number>();
  names.forEach((name, i) => {
    out[name] = countOf(out, name) + probabilities[i];
  });
  return out;
}

export interface CountTiming {
  windowSeconds: number;
  restartsPerDay: number;
  eventMin: number;
  eventMax: number;
}

export function expectedCounts(probabilities: readonly number[], timing: CountTiming): ExpectedCounts {
  const meanDelay = (timing.eventMin + timing.eventMax) / 2;
  const eventsPerWindow = timing.windowSeconds / meanDelay;
  const eventsPerDay = eventsPerWindow * timing.restartsPerDay;
  return {
    meanDelay,
    eventsPerWindow,
    eventsPerDay,
    perWindow: probabilities.map((p) => p * eventsPerWindow),
    perDay: probabilities.map((p) => p * eventsPerDay)
  };
}
