import type { DailyCount, RandomSource } from "./types";
import type { Selector } from "./selector";
import { countOf } from "./util";

export interface WindowTiming {
  windowSeconds: number;
  eventMin: number;
  eventMax: number;
}

export function sampleDelay(rng: RandomSource, eventMin: number, eventMax: number): number {
  return eventMin + rng.next() * (eventMax - eventMin);
}

/**
 * One restart window: advance the clock by a random delay, record an event if
 * the clock is still strictly inside the window, stop at the first delay that
 * crosses the boundary. Counts are added into `counts`; returns events recorded.
 */
export function runWindow(
  timing: WindowTiming,
  selector: Selector,
  timingRng: RandomSource,
  selectionRng: RandomSource,
  counts: DailyCount
): number {
  let elapsed = 0;
  let events = 0;
  while (true) {
    elapsed += sampleDelay(timingRng, timing.eventMin, timing.eventMax);
    if (elapsed >= timing.windowSeconds) break;
    const name = selector.draw(selectionRng);
    counts[name] = countOf(counts, name) + 1;
    events++;
  }
  return events;
}
