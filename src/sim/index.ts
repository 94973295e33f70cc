export { WeightTable } from "./weightTable";
export { BucketExpansion, WeightedAccumulation, Selector, createSelector } from "./selector";
export { runWindow } from "./scheduler";
export { DayRunner } from "./dayRunner";
export { stationaryNoRepeat, expectedCounts, toDistribution } from "./stationary";
export { StatsAggregator } from "./stats";
export { buildRunConfig, parseEventsFile } from "./config";
export { runSimulation, runPaced, runAnalysis, simulateDays } from "./run";
export { ConfigError, ExportError, RepeatExhaustedError } from "./errors";
export { Rng } from "./rng";
export { SIM_VERSION } from "./version";
export type { RunConfig, EventSpec, DayResult, EventStats, AnalyticRow, SimulationResult, AnalysisResult } from "./types";
