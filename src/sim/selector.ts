import type { ExhaustionPolicy, RandomSource, SelectionPolicy } from "./types";
import { MAX_REPEAT_ATTEMPTS } from "./constants";
import { RepeatExhaustedError } from "./errors";
import { uniqueNames } from "./util";
import type { WeightTable } from "./weightTable";

export interface SelectionPrimitive {
  draw(rng: RandomSource): string;
}

/** Quantized draw: every event owns `bucket_i` tickets in table order. */
export class BucketExpansion implements SelectionPrimitive {
  private readonly expanded: readonly string[];
  private readonly first: string;

  constructor(table: WeightTable) {
    const names = table.names();
    const buckets = table.buckets();
    const expanded: string[] = [];
    for (let i = 0; i < names.length; i++) {
      const repeats = Math.max(0, buckets[i]);
      for (let r = 0; r < repeats; r++) expanded.push(names[i]);
    }
    this.expanded = expanded;
    this.first = names[0];
  }

  get ticketCount(): number {
    return this.expanded.length;
  }

  draw(rng: RandomSource): string {
    if (this.expanded.length === 0) return this.first;
    return this.expanded[Math.floor(rng.next() * this.expanded.length)];
  }
}

/** Exact draw over the cumulative chance in [0, total). */
export class WeightedAccumulation implements SelectionPrimitive {
  private readonly items: ReadonlyArray<{ name: string; weight: number }>;
  private readonly total: number;

  constructor(table: WeightTable) {
    this.items = table.events.map((e) => ({ name: e.name, weight: e.chance }));
    this.total = table.totalChance();
  }

  draw(rng: RandomSource): string {
    if (this.total <= 0) return this.items[0].name;
    const r = rng.next() * this.total;
    let acc = 0;
    for (const it of this.items) {
      acc += it.weight;
      if (acc > r) return it.name;
    }
    // Rounding in the running sum can leave r just above the last boundary.
    return this.items[this.items.length - 1].name;
  }
}

export function createPrimitive(table: WeightTable, policy: SelectionPolicy): SelectionPrimitive {
  switch (policy) {
    case "bucket-expansion":
      return new BucketExpansion(table);
    case "weighted-accumulation":
      return new WeightedAccumulation(table);
  }
}

export interface RepeatGuard {
  maxAttempts: number;
  onExhausted: ExhaustionPolicy;
}

/**
 * Draws event names and remembers the last one.
 *
 * With a repeat guard, a draw equal to the previous one is redrawn up to
 * `maxAttempts` times. Avoidance is probabilistic: when every redraw repeats,
 * "accept" keeps the repeat (counted in `repeatsAccepted`) and "throw" raises
 * RepeatExhaustedError. Tables with a single distinct name never redraw.
 */
export class Selector {
  private last: string | null = null;
  private exhausted = 0;
  private readonly distinct: number;

  constructor(
    private readonly primitive: SelectionPrimitive,
    table: WeightTable,
    private readonly guard: RepeatGuard | null = null
  ) {
    this.distinct = uniqueNames(table.names()).length;
  }

  get lastDrawn(): string | null {
    return this.last;
  }

  get repeatsAccepted(): number {
    return this.exhausted;
  }

  reset(): void {
    this.last = null;
  }

  draw(rng: RandomSource): string {
    let name = this.primitive.draw(rng);
    if (this.guard && this.last !== null && this.distinct > 1 && name === this.last) {
      let attempts = 0;
      while (name === this.last && attempts < this.guard.maxAttempts) {
        name = this.primitive.draw(rng);
        attempts++;
      }
      if (name === this.last) {
        if (this.guard.onExhausted === "throw") throw new RepeatExhaustedError(name, attempts);
        this.exhausted++;
      }
    }
    this.last = name;
    return name;
  }
}

export function createSelector(
  table: WeightTable,
  policy: SelectionPolicy,
  forbidImmediateRepeat: boolean,
  guard: Partial<RepeatGuard> = {}
): Selector {
  const primitive = createPrimitive(table, policy);
  if (!forbidImmediateRepeat) return new Selector(primitive, table);
  return new Selector(primitive, table, {
    maxAttempts: guard.maxAttempts ?? MAX_REPEAT_ATTEMPTS,
    onExhausted: guard.onExhausted ?? "accept"
  });
}
