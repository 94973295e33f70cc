import type { DailyCount, EventStats } from "./types";
import { countOf, uniqueNames } from "./util";

/**
 * Streaming per-event mean/min/max over simulated days. Nothing is rounded here.
 */
export class StatsAggregator {
  private readonly names: string[];
  private readonly sums: number[];
  private readonly mins: number[];
  private readonly maxs: number[];
  private days = 0;
  private totalSum = 0;

  constructor(names: readonly string[]) {
    this.names = uniqueNames(names);
    this.sums = this.names.map(() => 0);
    this.mins = this.names.map(() => Infinity);
    this.maxs = this.names.map(() => -Infinity);
  }

  get dayCount(): number {
    return this.days;
  }

  add(counts: DailyCount): void {
    let total = 0;
    this.names.forEach((name, i) => {
      const c = countOf(counts, name);
      this.sums[i] += c;
      this.mins[i] = Math.min(this.mins[i], c);
      this.maxs[i] = Math.max(this.maxs[i], c);
      total += c;
    });
    this.totalSum += total;
    this.days++;
  }

  averageTotalPerDay(): number {
    return this.days === 0 ? 0 : this.totalSum / this.days;
  }

  /** One entry per distinct event name, configuration order. */
  summarize(restartsPerDay: number): EventStats[] {
    return this.names.map((event, i) => {
      if (this.days === 0) return { event, avgPerDay: 0, avgPerWindow: 0, minPerDay: 0, maxPerDay: 0 };
      const avgPerDay = this.sums[i] / this.days;
      return {
        event,
        avgPerDay,
        avgPerWindow: avgPerDay / restartsPerDay,
        minPerDay: this.mins[i],
        maxPerDay: this.maxs[i]
      };
    });
  }
}
