export const SECONDS_PER_DAY = 24 * 60 * 60;

// Each whole percent of chance is one ticket in the expanded bucket list.
export const BUCKET_SCALE = 100;
// Upper bound on the expanded ticket list (all events together).
export const MAX_TOTAL_BUCKETS = 1_000_000;

export const DEFAULT_EVENT_MIN = 1800;
export const DEFAULT_EVENT_MAX = 2100;
export const DEFAULT_RESTARTS_PER_DAY = 4;
export const DEFAULT_DAYS = 7;
export const DEFAULT_SEED = "event_window_sim_seed_001";

// No-repeat guard: redraws after the first draw before the exhaustion policy applies.
export const MAX_REPEAT_ATTEMPTS = 100;

// Stationary power iteration.
export const STATIONARY_TOLERANCE = 1e-12;
export const STATIONARY_MAX_ITERATIONS = 10000;
export const STATIONARY_DAMPING = 0.5;

// Display precision (exports only).
export const DIGITS_PROBABILITY = 6;
export const DIGITS_COUNT = 3;
