export function sum(arr: readonly number[]): number {
  return arr.reduce((s, x) => s + x, 0);
}

export function roundTo(n: number, digits: number): number {
  return +n.toFixed(digits);
}

// Names in first-seen order; duplicate event names share one counter.
export function uniqueNames(names: readonly string[]): string[] {
  return Array.from(new Set(names));
}

/**
 * Record keyed by event name. No prototype, so names such as "__proto__" or
 * "constructor" are ordinary keys.
 */
export function nameRecord<T>(): Record<string, T> {
  return Object.create(null);
}

export function emptyCounts(names: readonly string[]): Record<string, number> {
  const out = nameRecord<number>();
  for (const n of names) out[n] = 0;
  return out;
}

export function countOf(counts: Readonly<Record<string, number>>, name: string): number {
  return Object.hasOwn(counts, name) ? counts[name] : 0;
}
