import path from "node:path";
import type { RunConfigInput } from "../sim/config";
import { parseBool, parseExhaustionPolicy, parseNumber, parsePolicy, parseRepeatMemory } from "../sim/config";
import { ConfigError } from "../sim/errors";

export type Mode = "both" | "simulate" | "analytic";
export const MODES: readonly Mode[] = ["both", "simulate", "analytic"];

export interface BatchArgs {
  config: string;
  mode: Mode;
  outdir?: string;
  /** Day-at-a-time run with progress lines; implied by --intervalMs or --maxDays. */
  paced: boolean;
  intervalMs: number;
  /** 0 runs until interrupted. Unset means the configured day count. */
  maxDays?: number;
  overrides: Omit<RunConfigInput, "events">;
}

const BOOLEAN_FLAGS = new Set(["paced", "noRepeat"]);

function parseMode(raw: string): Mode {
  const found = MODES.find((m) => m === raw);
  if (!found) throw new ConfigError(`Invalid --mode value: ${raw}. Allowed: ${MODES.join("|")}`);
  return found;
}

function parseCount(flag: string, raw: string): number {
  const n = parseNumber(flag, raw);
  if (!Number.isInteger(n) || n < 0) throw new ConfigError(`--${flag} must be a whole number >= 0, got ${raw}`);
  return n;
}

/** `--key=value` flags; boolean flags may be given bare. Positional args are ignored. */
export function parseArgs(argv: readonly string[]): BatchArgs {
  const a: BatchArgs = { config: path.join("data", "events.json"), mode: "both", paced: false, intervalMs: 0, overrides: {} };
  const o = a.overrides;
  for (const arg of argv) {
    if (!arg.startsWith("--")) continue;
    const body = arg.slice(2);
    const eq = body.indexOf("=");
    const k = eq === -1 ? body : body.slice(0, eq);
    let v = eq === -1 ? undefined : body.slice(eq + 1);
    if (v === undefined) {
      if (!BOOLEAN_FLAGS.has(k)) throw new ConfigError(`--${k} needs a value (--${k}=...)`);
      v = "true";
    }

    if (k === "config") a.config = v;
    else if (k === "mode") a.mode = parseMode(v);
    else if (k === "outdir") a.outdir = v;
    else if (k === "paced") a.paced = parseBool(v);
    else if (k === "intervalMs") {
      a.intervalMs = parseCount(k, v);
      a.paced = true;
    } else if (k === "maxDays") {
      a.maxDays = parseCount(k, v);
      a.paced = true;
    } else if (k === "days") o.days = parseNumber(k, v);
    else if (k === "restarts") o.restartsPerDay = parseNumber(k, v);
    else if (k === "eventMin") o.eventMin = parseNumber(k, v);
    else if (k === "eventMax") o.eventMax = parseNumber(k, v);
    else if (k === "policy") o.policy = parsePolicy(v);
    else if (k === "noRepeat") o.forbidImmediateRepeat = parseBool(v);
    else if (k === "memory") o.repeatMemory = parseRepeatMemory(v);
    else if (k === "maxAttempts") o.maxRepeatAttempts = parseNumber(k, v);
    else if (k === "onExhausted") o.onRepeatExhausted = parseExhaustionPolicy(v);
    else if (k === "seed") o.seed = v;
    else throw new ConfigError(`Unknown flag --${k}`);
  }
  return a;
}
