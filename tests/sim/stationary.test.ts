import { describe, it, expect } from "vitest";
import { expectedCounts, stationaryNoRepeat, toDistribution } from "../../src/sim/stationary";

// The no-repeat chain is reversible with pi_i proportional to p_i * (1 - p_i).
function closedForm(p: number[]): number[] {
  const w = p.map((x) => x * (1 - x));
  const s = w.reduce((a, b) => a + b, 0);
  return w.map((x) => x / s);
}

describe("stationaryNoRepeat", () => {
  it("single event keeps probability 1", () => {
    const r = stationaryNoRepeat([1]);
    expect(r.probabilities).toEqual([1]);
    expect(r.converged).toBe(true);
    expect(r.iterations).toBe(0);
  });

  it("equal weights stay uniform", () => {
    for (const n of [2, 3, 5, 8]) {
      const base = Array.from({ length: n }, () => 1 / n);
      const r = stationaryNoRepeat(base);
      expect(r.converged).toBe(true);
      for (const p of r.probabilities) expect(p).toBeCloseTo(1 / n, 12);
    }
  });

  it("matches the closed form for a skewed table", () => {
    const base = [0.5, 0.3, 0.2];
    const r = stationaryNoRepeat(base);
    const expected = closedForm(base);
    expect(expected[0]).toBeCloseTo(0.403226, 6);
    r.probabilities.forEach((p, i) => expect(p).toBeCloseTo(expected[i], 9));
  });

  it("converges within the iteration cap for non-degenerate tables", () => {
    const tables = [
      [85 / 95, 10 / 95],
      [0.7, 0.2, 0.1],
      [0.4, 0.3, 0.2, 0.05, 0.05],
      [0.98, 0.01, 0.01],
      [0.49, 0.49, 0.01, 0.01]
    ];
    for (const base of tables) {
      const r = stationaryNoRepeat(base);
      expect(r.converged).toBe(true);
      expect(r.iterations).toBeLessThan(10000);
      expect(r.maxDiff).toBeLessThan(1e-12);
      const total = r.probabilities.reduce((a, b) => a + b, 0);
      expect(Math.abs(total - 1)).toBeLessThan(1e-9);
      r.probabilities.forEach((p, i) => expect(p).toBeCloseTo(closedForm(base)[i], 9));
    }
  });

  it("two events settle at one half each", () => {
    const r = stationaryNoRepeat([85 / 95, 10 / 95]);
    expect(r.probabilities[0]).toBeCloseTo(0.5, 12);
    expect(r.probabilities[1]).toBeCloseTo(0.5, 12);
  });

  it("plain power iteration oscillates on two events and hits the cap", () => {
    const base = [0.8, 0.2];
    const r = stationaryNoRepeat(base, { damping: 0 });
    expect(r.converged).toBe(false);
    expect(r.iterations).toBe(10000);
    // an even number of swaps lands back on the start vector
    expect(r.probabilities[0]).toBeCloseTo(0.8, 9);
    expect(r.probabilities[1]).toBeCloseTo(0.2, 9);
  });

  it("freezes a certain event instead of iterating", () => {
    const r = stationaryNoRepeat([1, 0, 0]);
    expect(r.probabilities).toEqual([1, 0, 0]);
    expect(r.converged).toBe(false);
    expect(r.iterations).toBe(0);
  });
});

describe("expectedCounts", () => {
  it("scales stationary probabilities by windowSeconds / meanDelay", () => {
    const e = expectedCounts([0.5, 0.5], { windowSeconds: 21600, restartsPerDay: 4, eventMin: 1800, eventMax: 2100 });
    expect(e.meanDelay).toBe(1950);
    expect(e.eventsPerWindow).toBeCloseTo(11.076923, 6);
    expect(e.eventsPerDay).toBeCloseTo(44.307692, 6);
    expect(e.perWindow[0]).toBeCloseTo(5.538462, 6);
    expect(e.perDay[1]).toBeCloseTo(22.153846, 6);
  });
});

describe("toDistribution", () => {
  it("keys probabilities by name and adds duplicates", () => {
    expect(toDistribution(["Fog", "Rain", "Fog"], [0.25, 0.5, 0.25])).toEqual({ Fog: 0.5, Rain: 0.5 });
  });

  it("keeps a name that shadows Object.prototype", () => {
    const d = toDistribution(["__proto__", "Fog"], [0.25, 0.75]);
    expect(Object.keys(d)).toEqual(["__proto__", "Fog"]);
    expect(d["__proto__"]).toBe(0.25);
    expect(d["Fog"]).toBe(0.75);
  });
});
