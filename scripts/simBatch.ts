#!/usr/bin/env node
import path from "node:path";
import { APP_VERSION } from "../src/version";
import { ConfigError, ExportError, SIM_VERSION, buildRunConfig, runAnalysis, runPaced, runSimulation } from "../src/sim/index";
import type { RunConfig, SimulationResult } from "../src/sim/index";
import { parseArgs, type BatchArgs } from "../src/cli/args";
import {
  ANALYTIC_HEADERS,
  SUMMARY_HEADERS,
  buildAnalyticTable,
  buildDayRecords,
  buildSummaryTable,
  formatDayProgress,
  toMarkdownTable
} from "../src/sim/exports";
import { readEventsFile, writeCsvFile, writeJsonFile } from "../src/io/files";

function loadConfig(args: BatchArgs): RunConfig {
  const file = readEventsFile(args.config);
  // defaults < config file < flags
  return buildRunConfig({
    events: file.events,
    eventMin: file.eventMin,
    eventMax: file.eventMax,
    ...args.overrides
  });
}

function printHeader(config: RunConfig, args: BatchArgs) {
  console.log(`APP_VERSION: ${APP_VERSION}  SIM_VERSION: ${SIM_VERSION}`);
  console.log(
    `events=${config.events.length} days=${config.days} restartsPerDay=${config.restartsPerDay} ` +
      `windowSeconds=${config.windowSeconds} eventMin=${config.eventMin} eventMax=${config.eventMax} ` +
      `policy=${config.policy} noRepeat=${config.forbidImmediateRepeat} memory=${config.repeatMemory} ` +
      `maxAttempts=${config.maxRepeatAttempts} onExhausted=${config.onRepeatExhausted} seed=${config.seed}`
  );
  if (args.paced) {
    const maxDays = args.maxDays ?? config.days;
    console.log(`paced: intervalMs=${args.intervalMs} maxDays=${maxDays === 0 ? "until Ctrl+C" : maxDays}`);
  }
  console.log("");
}

async function simulate(config: RunConfig, args: BatchArgs): Promise<SimulationResult> {
  const keepDays = Boolean(args.outdir);
  if (!args.paced) return runSimulation(config, { keepDays });

  const controller = new AbortController();
  const stop = () => controller.abort();
  process.once("SIGINT", stop);
  try {
    return await runPaced(config, {
      intervalMs: args.intervalMs,
      maxDays: args.maxDays,
      signal: controller.signal,
      keepDays,
      onDay: (day, stats) => console.log(formatDayProgress(day, stats.averageTotalPerDay()))
    });
  } finally {
    process.off("SIGINT", stop);
  }
}

async function main() {
  const args = parseArgs(process.argv.slice(2));
  const config = loadConfig(args);
  printHeader(config, args);

  const analytic = args.mode !== "simulate" ? buildAnalyticTable(runAnalysis(config)) : null;
  if (analytic) {
    console.log("Analytic (stationary, no immediate repeat)");
    console.log(toMarkdownTable(ANALYTIC_HEADERS, analytic));
    console.log("");
  }

  const sim = args.mode !== "analytic" ? await simulate(config, args) : null;
  const summary = sim ? buildSummaryTable(sim.stats) : null;
  if (sim && summary) {
    if (args.paced) console.log("");
    console.log(`Monte-Carlo (${sim.daysSimulated} days)`);
    console.log(toMarkdownTable(SUMMARY_HEADERS, summary));
    console.log(`Average total per day: ${sim.averageTotalPerDay.toFixed(3)}`);
    if (sim.repeatsAccepted > 0) console.log(`Repeats accepted after exhausted redraws: ${sim.repeatsAccepted}`);
    console.log("");
  }

  if (!args.outdir) return;
  const outdir = args.outdir;
  try {
    if (analytic) writeCsvFile(path.join(outdir, "analytic.csv"), ANALYTIC_HEADERS, analytic);
    if (sim && summary) {
      writeCsvFile(path.join(outdir, "summary.csv"), SUMMARY_HEADERS, summary);
      const records = buildDayRecords(config.events.map((e) => e.name), sim.days, true);
      writeCsvFile(path.join(outdir, "days.csv"), records.headers, records.rows);
    }
    writeJsonFile(path.join(outdir, "run_config.json"), { app_version: APP_VERSION, sim_version: SIM_VERSION, config });
    console.log(`Done. Wrote artifacts to ${outdir}`);
  } catch (err) {
    if (!(err instanceof ExportError)) throw err;
    console.error(`Export failed (${err.path}): ${err.message}`);
    process.exitCode = 2;
  }
}

main().catch((err: unknown) => {
  if (!(err instanceof ConfigError)) throw err;
  console.error(`Config error: ${err.message}`);
  process.exitCode = 1;
});
