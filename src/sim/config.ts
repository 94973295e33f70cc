import { z } from "zod";
import type { EventSpec, ExhaustionPolicy, RepeatMemory, RunConfig, SelectionPolicy } from "./types";
import {
  DEFAULT_DAYS,
  DEFAULT_EVENT_MAX,
  DEFAULT_EVENT_MIN,
  DEFAULT_RESTARTS_PER_DAY,
  DEFAULT_SEED,
  MAX_REPEAT_ATTEMPTS,
  SECONDS_PER_DAY
} from "./constants";
import { ConfigError } from "./errors";

// =============================================================================
// Config file schemas
// =============================================================================

const ChanceSchema = z.number().finite().min(0, "Chance cannot be negative");

/**
 * One event entry. `{ Name, Chance }` is the historical casing; `{ name, chance }`
 * is accepted as well.
 */
export const EventEntrySchema = z
  .union([
    z.object({ Name: z.string().min(1, "Event name is required"), Chance: ChanceSchema }),
    z.object({ name: z.string().min(1, "Event name is required"), chance: ChanceSchema })
  ])
  .transform((e): EventSpec => ("Name" in e ? { name: e.Name, chance: e.Chance } : { name: e.name, chance: e.chance }));

export const EventListSchema = z.array(EventEntrySchema);

/** Object shape: present timing fields override the defaults. */
export const EventsObjectSchema = z.object({
  EventMin: z.number().finite().min(0).optional(),
  EventMax: z.number().finite().positive().optional(),
  Events: EventListSchema
});

export interface EventsFile {
  events: EventSpec[];
  eventMin?: number;
  eventMax?: number;
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.length > 0 ? i.path.join(".") : "(root)"}: ${i.message}`).join("; ");
}

/**
 * Normalizes either supported configuration shape: a bare array of events, or
 * `{ EventMin?, EventMax?, Events: [...] }`.
 */
export function parseEventsFile(raw: unknown): EventsFile {
  let out: EventsFile;
  if (Array.isArray(raw)) {
    const res = EventListSchema.safeParse(raw);
    if (!res.success) throw new ConfigError(`invalid event list: ${formatIssues(res.error)}`);
    out = { events: res.data };
  } else if (typeof raw === "object" && raw !== null && "Events" in raw) {
    const res = EventsObjectSchema.safeParse(raw);
    if (!res.success) throw new ConfigError(`invalid events config: ${formatIssues(res.error)}`);
    out = { events: res.data.Events };
    if (res.data.EventMin !== undefined) out.eventMin = res.data.EventMin;
    if (res.data.EventMax !== undefined) out.eventMax = res.data.EventMax;
  } else {
    throw new ConfigError("unrecognized configuration shape: expected an event array or an object with Events");
  }
  if (out.events.length === 0) throw new ConfigError("event list is empty");
  return out;
}

// =============================================================================
// Run config
// =============================================================================

export const SELECTION_POLICIES = ["bucket-expansion", "weighted-accumulation"] as const satisfies readonly SelectionPolicy[];
export const REPEAT_MEMORIES = ["run", "day", "window"] as const satisfies readonly RepeatMemory[];
export const EXHAUSTION_POLICIES = ["accept", "throw"] as const satisfies readonly ExhaustionPolicy[];

const RunOptionsSchema = z
  .object({
    events: z.array(z.object({ name: z.string(), chance: ChanceSchema })).min(1, "event list is empty"),
    days: z.number().int().min(1, "days must be at least 1"),
    restartsPerDay: z.number().int().min(1, "restartsPerDay must be at least 1"),
    eventMin: z.number().finite().min(0, "eventMin cannot be negative"),
    eventMax: z.number().finite().positive("eventMax must be positive"),
    policy: z.enum(SELECTION_POLICIES),
    forbidImmediateRepeat: z.boolean(),
    repeatMemory: z.enum(REPEAT_MEMORIES),
    maxRepeatAttempts: z.number().int().min(0),
    onRepeatExhausted: z.enum(EXHAUSTION_POLICIES),
    seed: z.string().min(1)
  })
  .refine((o) => o.eventMin <= o.eventMax, { message: "eventMin must not exceed eventMax", path: ["eventMin"] });

export interface RunConfigInput {
  events: readonly EventSpec[];
  days?: number;
  restartsPerDay?: number;
  eventMin?: number;
  eventMax?: number;
  policy?: SelectionPolicy;
  forbidImmediateRepeat?: boolean;
  repeatMemory?: RepeatMemory;
  maxRepeatAttempts?: number;
  onRepeatExhausted?: ExhaustionPolicy;
  seed?: string;
}

export function buildRunConfig(input: RunConfigInput): RunConfig {
  const res = RunOptionsSchema.safeParse({
    events: input.events.map((e) => ({ name: e.name, chance: e.chance })),
    days: input.days ?? DEFAULT_DAYS,
    restartsPerDay: input.restartsPerDay ?? DEFAULT_RESTARTS_PER_DAY,
    eventMin: input.eventMin ?? DEFAULT_EVENT_MIN,
    eventMax: input.eventMax ?? DEFAULT_EVENT_MAX,
    policy: input.policy ?? "bucket-expansion",
    forbidImmediateRepeat: input.forbidImmediateRepeat ?? true,
    repeatMemory: input.repeatMemory ?? "day",
    maxRepeatAttempts: input.maxRepeatAttempts ?? MAX_REPEAT_ATTEMPTS,
    onRepeatExhausted: input.onRepeatExhausted ?? "accept",
    seed: input.seed ?? DEFAULT_SEED
  });
  if (!res.success) throw new ConfigError(`invalid run config: ${formatIssues(res.error)}`);
  const o = res.data;
  return {
    ...o,
    windowSeconds: Math.floor(SECONDS_PER_DAY / o.restartsPerDay)
  };
}

// =============================================================================
// CLI value parsing
// =============================================================================

const POLICY_ALIASES = new Map<string, SelectionPolicy>([
  ["bucket", "bucket-expansion"],
  ["bucket-expansion", "bucket-expansion"],
  ["bucketexpansion", "bucket-expansion"],
  ["weighted", "weighted-accumulation"],
  ["weighted-accumulation", "weighted-accumulation"],
  ["weightedaccumulation", "weighted-accumulation"]
]);

export function parsePolicy(raw: string): SelectionPolicy {
  const p = POLICY_ALIASES.get(raw.trim().toLowerCase());
  if (!p) throw new ConfigError(`Invalid policy value: ${raw}. Allowed: ${SELECTION_POLICIES.join("|")}`);
  return p;
}

export function parseRepeatMemory(raw: string): RepeatMemory {
  const v = raw.trim().toLowerCase();
  const found = REPEAT_MEMORIES.find((m) => m === v);
  if (!found) throw new ConfigError(`Invalid memory value: ${raw}. Allowed: ${REPEAT_MEMORIES.join("|")}`);
  return found;
}

export function parseExhaustionPolicy(raw: string): ExhaustionPolicy {
  const v = raw.trim().toLowerCase();
  const found = EXHAUSTION_POLICIES.find((p) => p === v);
  if (!found) throw new ConfigError(`Invalid onExhausted value: ${raw}. Allowed: ${EXHAUSTION_POLICIES.join("|")}`);
  return found;
}

export function parseBool(raw: string): boolean {
  const v = raw.trim().toLowerCase();
  if (v === "true" || v === "1" || v === "yes") return true;
  if (v === "false" || v === "0" || v === "no") return false;
  throw new ConfigError(`Invalid boolean value: ${raw}`);
}

export function parseNumber(flag: string, raw: string): number {
  const n = Number(raw);
  if (raw.trim() === "" || !Number.isFinite(n)) throw new ConfigError(`Invalid --${flag} value: ${raw}`);
  return n;
}
