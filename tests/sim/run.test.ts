import { describe, it, expect } from "vitest";
import { buildRunConfig, parseEventsFile } from "../../src/sim/config";
import { runAnalysis, runPaced, runSimulation, simulateDays } from "../../src/sim/run";
import { ConfigError, RepeatExhaustedError } from "../../src/sim/errors";

const events = [
  { name: "Snowfall", chance: 0.6 },
  { name: "Fog", chance: 0.3 },
  { name: "Blizzard", chance: 0.1 }
];

describe("runSimulation", () => {
  it("aggregates every configured day", () => {
    const config = buildRunConfig({ events, days: 12, seed: "run_sim_seed" });
    const res = runSimulation(config, { keepDays: true });
    expect(res.daysSimulated).toBe(12);
    expect(res.days.map((d) => d.day)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12]);
    const totals = res.days.reduce((s, d) => s + d.total, 0);
    expect(res.averageTotalPerDay).toBeCloseTo(totals / 12, 12);
    for (const s of res.stats) {
      expect(s.minPerDay).toBeLessThanOrEqual(s.avgPerDay);
      expect(s.avgPerDay).toBeLessThanOrEqual(s.maxPerDay);
      expect(s.avgPerWindow).toBeCloseTo(s.avgPerDay / 4, 12);
    }
  });

  it("keeps no day records unless asked", () => {
    const config = buildRunConfig({ events, days: 3 });
    expect(runSimulation(config).days).toEqual([]);
  });

  it("surfaces exhaustion under the throw policy", () => {
    const config = buildRunConfig({
      events: [{ name: "Sun", chance: 1 }, { name: "Never", chance: 0 }],
      days: 1,
      onRepeatExhausted: "throw"
    });
    expect(() => runSimulation(config)).toThrow(RepeatExhaustedError);
  });

  it("counts an event named __proto__ like any other", () => {
    const file = parseEventsFile([
      { Name: "__proto__", Chance: 0.5 },
      { Name: "Fog", Chance: 0.5 }
    ]);
    const config = buildRunConfig({ events: file.events, days: 3, seed: "proto_seed" });
    const res = runSimulation(config, { keepDays: true });
    for (const d of res.days) {
      expect(d.counts["__proto__"] + d.counts["Fog"]).toBe(d.total);
    }
    const proto = res.stats.find((s) => s.event === "__proto__");
    expect(proto?.avgPerDay).toBeGreaterThan(0);
    const statSum = res.stats.reduce((s, x) => s + x.avgPerDay, 0);
    expect(res.averageTotalPerDay).toBeCloseTo(statSum, 12);
    expect(runAnalysis(config).distribution["__proto__"]).toBeCloseTo(0.5, 9);
  });

  it("counts accepted repeats under the default policy", () => {
    const config = buildRunConfig({ events: [{ name: "Sun", chance: 1 }, { name: "Never", chance: 0 }], days: 2 });
    const res = runSimulation(config);
    const sun = res.stats.find((s) => s.event === "Sun");
    expect(res.repeatsAccepted).toBe(res.averageTotalPerDay * 2 - 2);
    expect(sun?.avgPerDay).toBe(res.averageTotalPerDay);
  });
});

describe("simulateDays", () => {
  it("yields days lazily in order", () => {
    const config = buildRunConfig({ events, days: 3 });
    const gen = simulateDays(config);
    expect(gen.next().value?.day).toBe(1);
    expect(gen.next().value?.day).toBe(2);
    expect(gen.next().value?.day).toBe(3);
    expect(gen.next().done).toBe(true);
  });
});

describe("runPaced", () => {
  it("stops after maxDays and matches the batch run", async () => {
    const config = buildRunConfig({ events, days: 4, seed: "paced_seed" });
    const seen: number[] = [];
    const paced = await runPaced(config, { intervalMs: 0, onDay: (d) => seen.push(d.day) });
    expect(seen).toEqual([1, 2, 3, 4]);
    expect(paced.stats).toEqual(runSimulation(config).stats);
  });

  it("runs until aborted when maxDays is 0", async () => {
    const config = buildRunConfig({ events, days: 1 });
    const ctrl = new AbortController();
    const res = await runPaced(config, {
      maxDays: 0,
      intervalMs: 1,
      signal: ctrl.signal,
      onDay: (d) => {
        if (d.day === 5) ctrl.abort();
      }
    });
    expect(res.daysSimulated).toBe(5);
  });

  it("stops during the pause between days", async () => {
    const config = buildRunConfig({ events, days: 1 });
    const ctrl = new AbortController();
    setTimeout(() => ctrl.abort(), 20);
    const res = await runPaced(config, { maxDays: 0, intervalMs: 1000, signal: ctrl.signal });
    expect(res.daysSimulated).toBe(1);
  });

  it("rejects a negative or fractional maxDays", async () => {
    const config = buildRunConfig({ events, days: 1 });
    await expect(runPaced(config, { maxDays: -1 })).rejects.toThrow(/maxDays must be a whole number/);
    await expect(runPaced(config, { maxDays: 1.5 })).rejects.toThrow(ConfigError);
  });

  it("refuses an endless run without a signal", async () => {
    const config = buildRunConfig({ events, days: 1 });
    await expect(runPaced(config, { maxDays: 0 })).rejects.toThrow(ConfigError);
  });
});

describe("runAnalysis", () => {
  it("reports buckets, base and stationary in configuration order", () => {
    const a = runAnalysis(buildRunConfig({ events }));
    expect(a.names).toEqual(["Snowfall", "Fog", "Blizzard"]);
    expect(a.buckets).toEqual([60, 30, 10]);
    expect(a.stationary.converged).toBe(true);
    // no-repeat pushes mass away from the dominant event
    expect(a.stationary.probabilities[0]).toBeLessThan(a.base[0]);
    expect(a.stationary.probabilities[2]).toBeGreaterThan(a.base[2]);
    expect(a.expected.meanDelay).toBe(1950);
  });
});
