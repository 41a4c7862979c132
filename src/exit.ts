import type { RunStatus } from "./types.js";

export type ExitOutcome = RunStatus | "config_error" | "internal_error";

// Successful runs still get distinct codes so the scheduler can tell them apart
export const EXIT_CODES = {
  no_change: 0,
  fetch_failed: 1,
  config_error: 2,
  persist_failed: 3,
  internal_error: 4,
  bootstrap: 10,
  change_notified: 11,
  change_notify_failed: 12,
} as const satisfies Record<ExitOutcome, number>;

export function exitCodeFor(outcome: ExitOutcome): number {
  return EXIT_CODES[outcome];
}
