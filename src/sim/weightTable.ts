import type { EventSpec } from "./types";
import { BUCKET_SCALE, MAX_TOTAL_BUCKETS } from "./constants";
import { ConfigError } from "./errors";
import { sum } from "./util";

/**
 * Ordered, immutable list of weighted events.
 *
 * Bucket counts are `ceil(chance * 100)` computed in floating point, so a chance
 * such as 0.07 lands on 8 tickets (0.07 * 100 = 7.000000000000001). Host engines
 * that quantize the same way produce the same skew. The bucket total is capped at
 * MAX_TOTAL_BUCKETS, since bucket expansion materializes one entry per ticket.
 */
export class WeightTable {
  readonly events: readonly EventSpec[];
  private readonly bucketCounts: readonly number[];

  constructor(events: readonly EventSpec[]) {
    if (events.length === 0) throw new ConfigError("event list is empty");
    for (const e of events) {
      if (!Number.isFinite(e.chance) || e.chance < 0) {
        throw new ConfigError(`event "${e.name}" has invalid chance ${e.chance}`);
      }
    }
    this.events = Object.freeze(events.map((e) => Object.freeze({ name: e.name, chance: e.chance })));
    const buckets = this.events.map((e) => {
      const b = Math.ceil(e.chance * BUCKET_SCALE);
      if (!Number.isSafeInteger(b)) throw new ConfigError(`event "${e.name}" has chance ${e.chance}, too large to bucket`);
      return b;
    });
    const total = sum(buckets);
    if (total > MAX_TOTAL_BUCKETS) {
      throw new ConfigError(`bucket total ${total} exceeds ${MAX_TOTAL_BUCKETS}; scale the chances down`);
    }
    this.bucketCounts = Object.freeze(buckets);
  }

  get size(): number {
    return this.events.length;
  }

  names(): string[] {
    return this.events.map((e) => e.name);
  }

  buckets(): number[] {
    return this.bucketCounts.slice();
  }

  totalChance(): number {
    return sum(this.events.map((e) => e.chance));
  }

  /**
   * Buckets normalized; falls back to raw chances when every bucket is zero,
   * then to uniform when every chance is zero too.
   */
  baseProbabilities(): number[] {
    const bucketSum = sum(this.bucketCounts);
    if (bucketSum > 0) return this.bucketCounts.map((b) => b / bucketSum);
    const chanceSum = this.totalChance();
    if (chanceSum > 0) return this.events.map((e) => e.chance / chanceSum);
    return this.events.map(() => 1 / this.events.length);
  }
}
