import type { DayResult, RunConfig } from "./types";
import { Rng } from "./rng";
import { runWindow } from "./scheduler";
import { createSelector, type Selector } from "./selector";
import { emptyCounts, uniqueNames } from "./util";
import type { WeightTable } from "./weightTable";

/**
 * Runs every restart window of a day against one selector.
 *
 * Each day reads its own "timing" and "selection" streams, so day N produces the
 * same counts whether it runs first, last or on another worker. Only
 * repeatMemory "run" couples days, through the selector's last-drawn name.
 */
export class DayRunner {
  readonly selector: Selector;
  private readonly names: string[];

  constructor(
    private readonly config: RunConfig,
    table: WeightTable,
    selector?: Selector
  ) {
    this.names = uniqueNames(table.names());
    this.selector =
      selector ??
      createSelector(table, config.policy, config.forbidImmediateRepeat, {
        maxAttempts: config.maxRepeatAttempts,
        onExhausted: config.onRepeatExhausted
      });
  }

  runDay(day: number): DayResult {
    const { config, selector } = this;
    if (config.repeatMemory === "day") selector.reset();

    const timingRng = new Rng(config.seed, "timing", day);
    const selectionRng = new Rng(config.seed, "selection", day);
    const counts = emptyCounts(this.names);
    const repeatsBefore = selector.repeatsAccepted;

    let total = 0;
    for (let w = 0; w < config.restartsPerDay; w++) {
      if (config.repeatMemory === "window") selector.reset();
      total += runWindow(config, selector, timingRng, selectionRng, counts);
    }

    return { day, total, counts, repeatsAccepted: selector.repeatsAccepted - repeatsBefore };
  }
}
