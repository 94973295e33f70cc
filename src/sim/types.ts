export interface RandomSource {
  next(): number; // [0, 1)
}

export interface EventSpec {
  name: string;
  chance: number; // >= 0, relative weight
}

export type SelectionPolicy = "bucket-expansion" | "weighted-accumulation";

// Where the no-repeat memory is cleared. "day" matches the historical behavior.
export type RepeatMemory = "run" | "day" | "window";

export type ExhaustionPolicy = "accept" | "throw";

export interface RunConfig {
  events: readonly EventSpec[];
  days: number;
  restartsPerDay: number;
  windowSeconds: number; // floor(86400 / restartsPerDay)
  eventMin: number; // seconds
  eventMax: number; // seconds
  policy: SelectionPolicy;
  forbidImmediateRepeat: boolean;
  repeatMemory: RepeatMemory;
  maxRepeatAttempts: number;
  onRepeatExhausted: ExhaustionPolicy;
  seed: string;
}

export type DailyCount = Record<string, number>;

export interface DayResult {
  day: number; // 1-based
  total: number;
  counts: DailyCount;
  repeatsAccepted: number;
}

export interface StationaryResult {
  probabilities: number[]; // table order
  iterations: number;
  converged: boolean;
  maxDiff: number;
}

export type StationaryDistribution = Record<string, number>;

export interface ExpectedCounts {
  meanDelay: number;
  eventsPerWindow: number;
  eventsPerDay: number;
  perWindow: number[];
  perDay: number[];
}

export interface EventStats {
  event: string;
  avgPerDay: number;
  avgPerWindow: number;
  minPerDay: number;
  maxPerDay: number;
}

export interface AnalyticRow {
  event: string;
  bucket: number;
  probability: number;
  perWindow: number;
  perDay: number;
}

export interface SimulationResult {
  config: RunConfig;
  daysSimulated: number;
  stats: EventStats[];
  averageTotalPerDay: number;
  repeatsAccepted: number;
  days: DayResult[]; // empty unless keepDays was requested
}

export interface AnalysisResult {
  names: string[];
  buckets: number[];
  base: number[];
  stationary: StationaryResult;
  distribution: StationaryDistribution;
  expected: ExpectedCounts;
}
