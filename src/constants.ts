import type { PolicyName } from "./types/index.js";

export const SIMULATOR_VERSION = "1.0.0";

/** Upper bound on the ticks a single HTTP request may simulate. */
export const MAX_REQUEST_TICKS = 1_000_000;

/** Order in which policies are compared when the caller names none. */
export const POLICY_ORDER: readonly PolicyName[] = [
  "fcfs",
  "sjf",
  "srtn",
  "round_robin",
];
