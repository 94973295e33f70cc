import { setTimeout as sleep } from "node:timers/promises";
import type { AnalysisResult, DayResult, RunConfig, SimulationResult } from "./types";
import { DayRunner } from "./dayRunner";
import { ConfigError } from "./errors";
import { expectedCounts, stationaryNoRepeat, toDistribution, type StationaryOptions } from "./stationary";
import { StatsAggregator } from "./stats";
import { WeightTable } from "./weightTable";

export function* simulateDays(config: RunConfig, table: WeightTable = new WeightTable(config.events)): Generator<DayResult> {
  const runner = new DayRunner(config, table);
  for (let day = 1; day <= config.days; day++) {
    yield runner.runDay(day);
  }
}

export interface RunOptions {
  keepDays?: boolean;
}

export function runSimulation(config: RunConfig, opts: RunOptions = {}): SimulationResult {
  const table = new WeightTable(config.events);
  const agg = new StatsAggregator(table.names());
  const days: DayResult[] = [];
  let repeatsAccepted = 0;

  for (const res of simulateDays(config, table)) {
    agg.add(res.counts);
    repeatsAccepted += res.repeatsAccepted;
    if (opts.keepDays) days.push(res);
  }

  return {
    config,
    daysSimulated: agg.dayCount,
    stats: agg.summarize(config.restartsPerDay),
    averageTotalPerDay: agg.averageTotalPerDay(),
    repeatsAccepted,
    days
  };
}

export interface PacedOptions {
  intervalMs?: number;
  /** 0 runs until `signal` aborts. Defaults to config.days. */
  maxDays?: number;
  signal?: AbortSignal;
  keepDays?: boolean;
  onDay?: (day: DayResult, stats: StatsAggregator) => void;
}

/**
 * Day-at-a-time run with a pause between days. Each day is computed whole before
 * `onDay` sees it, so stopping never leaves a partial day behind.
 */
export async function runPaced(config: RunConfig, opts: PacedOptions = {}): Promise<SimulationResult> {
  const maxDays = opts.maxDays ?? config.days;
  const intervalMs = Math.max(0, opts.intervalMs ?? 0);
  const { signal } = opts;
  if (!Number.isInteger(maxDays) || maxDays < 0) throw new ConfigError(`maxDays must be a whole number >= 0, got ${maxDays}`);
  if (maxDays === 0 && !signal) throw new ConfigError("maxDays=0 needs an AbortSignal to stop the run");

  const table = new WeightTable(config.events);
  const runner = new DayRunner(config, table);
  const agg = new StatsAggregator(table.names());
  const days: DayResult[] = [];
  let repeatsAccepted = 0;

  for (let day = 1; maxDays === 0 || day <= maxDays; day++) {
    if (signal?.aborted) break;
    const res = runner.runDay(day);
    agg.add(res.counts);
    repeatsAccepted += res.repeatsAccepted;
    if (opts.keepDays) days.push(res);
    opts.onDay?.(res, agg);

    if (signal?.aborted) break;
    try {
      await sleep(intervalMs, undefined, { signal });
    } catch (err) {
      if (signal?.aborted) break;
      throw err;
    }
  }

  return {
    config,
    daysSimulated: agg.dayCount,
    stats: agg.summarize(config.restartsPerDay),
    averageTotalPerDay: agg.averageTotalPerDay(),
    repeatsAccepted,
    days
  };
}

export function runAnalysis(config: RunConfig, opts: StationaryOptions = {}): AnalysisResult {
  const table = new WeightTable(config.events);
  const base = table.baseProbabilities();
  const stationary = stationaryNoRepeat(base, opts);
  const names = table.names();
  return {
    names,
    buckets: table.buckets(),
    base,
    stationary,
    distribution: toDistribution(names, stationary.probabilities),
    expected: expectedCounts(stationary.probabilities, config)
  };
}
