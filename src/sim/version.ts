// Bump when selection, timing or stationary math changes in a way that moves seeded outputs.
export const SIM_VERSION = "sim_v0.1.0";
