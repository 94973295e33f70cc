import type { AnalysisResult, AnalyticRow, DayResult, EventStats } from "./types";
import { DIGITS_COUNT, DIGITS_PROBABILITY } from "./constants";
import { countOf, nameRecord, roundTo, uniqueNames } from "./util";

export type CsvValue = string | number | null | undefined;

/** Sorted by event name (code-point order), averages rounded for display. */
export function buildSummaryTable(stats: readonly EventStats[]): EventStats[] {
  return stats
    .map((s) => ({
      event: s.event,
      avgPerDay: roundTo(s.avgPerDay, DIGITS_COUNT),
      avgPerWindow: roundTo(s.avgPerWindow, DIGITS_COUNT),
      minPerDay: s.minPerDay,
      maxPerDay: s.maxPerDay
    }))
    .sort((a, b) => (a.event < b.event ? -1 : a.event > b.event ? 1 : 0));
}

/** Configuration order. */
export function buildAnalyticTable(analysis: AnalysisResult): AnalyticRow[] {
  const { names, buckets, stationary, expected } = analysis;
  return names.map((event, i) => ({
    event,
    bucket: buckets[i],
    probability: roundTo(stationary.probabilities[i], DIGITS_PROBABILITY),
    perWindow: roundTo(expected.perWindow[i], DIGITS_COUNT),
    perDay: roundTo(expected.perDay[i], DIGITS_COUNT)
  }));
}

export interface DayRecords {
  headers: string[];
  rows: Array<Record<string, number>>;
}

/**
 * Wide per-day records. Headers are `day` then event names in configuration
 * order; rows are keyed by header, so consumers must iterate `headers` (an event
 * named "2" would otherwise sort ahead of "day" in key order).
 */
export function buildDayRecords(eventNames: readonly string[], days: readonly DayResult[], withTotal = false): DayRecords {
  const names = uniqueNames(eventNames);
  const headers = ["day", ...(withTotal ? ["total"] : []), ...names];
  const rows = days.map((d) => {
    const row = nameRecord<number>();
    row.day = d.day;
    if (withTotal) row.total = d.total;
    for (const n of names) row[n] = countOf(d.counts, n);
    return row;
  });
  return { headers, rows };
}

/** Progress line printed after each day of a paced run. */
export function formatDayProgress(day: DayResult, averageTotalPerDay: number): string {
  return `day ${day.day}: total=${day.total} avgTotalPerDay=${averageTotalPerDay.toFixed(DIGITS_COUNT)}`;
}

export function csvEscape(v: CsvValue): string {
  const s = String(v ?? "");
  if (/[",\n]/.test(s)) return `"${s.replace(/"/g, '""')}"`;
  return s;
}

export function toCsv<K extends string>(headers: readonly K[], rows: ReadonlyArray<Readonly<Record<K, CsvValue>>>): string {
  const lines: string[] = [];
  lines.push(headers.map(csvEscape).join(","));
  for (const row of rows) {
    lines.push(headers.map((h) => csvEscape(row[h])).join(","));
  }
  return lines.join("\n");
}

function mdEscape(s: string): string {
  return s.replace(/\|/g, "\\|").replace(/\n/g, " ");
}

export function toMarkdownTable<K extends string>(headers: readonly K[], rows: ReadonlyArray<Readonly<Record<K, CsvValue>>>): string {
  const out: string[] = [];
  out.push(`| ${headers.map(mdEscape).join(" | ")} |`);
  out.push(`| ${headers.map(() => "---").join(" | ")} |`);
  for (const r of rows) {
    out.push(`| ${headers.map((h) => mdEscape(String(r[h] ?? ""))).join(" | ")} |`);
  }
  return out.join("\n");
}

export const SUMMARY_HEADERS = ["event", "avgPerDay", "avgPerWindow", "minPerDay", "maxPerDay"] as const;
export const ANALYTIC_HEADERS = ["event", "bucket", "probability", "perWindow", "perDay"] as const;
