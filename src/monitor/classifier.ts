/**
 * Reduces a raw TES state plus task age to what a polling agent needs:
 * a coarse status and how long to wait before the next check.
 *
 * Pure functions only; nothing here sleeps or remembers earlier calls.
 */
import { isOneOf, type ObservedState } from "../tes/state.js";

export const SIMPLIFIED_STATUSES = [
  "completed_success",
  "completed_failed",
  "still_running",
  "still_running_timeout",
  "canceled",
  "error_state",
  "unknown_state",
] as const;

export type SimplifiedStatus = (typeof SIMPLIFIED_STATUSES)[number];

export function classify(
  state: ObservedState,
  elapsedMinutes: number,
  maxWaitMinutes: number
): SimplifiedStatus {
  if (isOneOf(state, "COMPLETE")) return "completed_success";
  if (isOneOf(state, "EXECUTOR_ERROR", "SYSTEM_ERROR")) return "completed_failed";
  if (isOneOf(state, "CANCELED")) return "canceled";
  if (isOneOf(state, "RUNNING", "QUEUED", "INITIALIZING")) {
    return elapsedMinutes >= maxWaitMinutes ? "still_running_timeout" : "still_running";
  }
  if (isOneOf(state, "PAUSED", "PREEMPTED")) return "error_state";

  // UNKNOWN, CANCELING and states this client has never heard of.
  return "unknown_state";
}

/**
 * Seconds until the next poll. Step-wise, not exponential: a long-running
 * task is checked at most every 3 × base.
 */
export function adaptiveInterval(
  state: ObservedState,
  elapsedMinutes: number,
  baseIntervalSeconds: number
): number {
  const half = Math.floor(baseIntervalSeconds / 2);

  // Catch tasks that finish almost immediately.
  if (elapsedMinutes < 1) {
    return Math.max(2, half);
  }

  if (isOneOf(state, "RUNNING", "INITIALIZING")) {
    if (elapsedMinutes < 5) return baseIntervalSeconds;
    if (elapsedMinutes < 15) return baseIntervalSeconds * 2;
    return baseIntervalSeconds * 3;
  }

  if (isOneOf(state, "QUEUED")) {
    return baseIntervalSeconds;
  }

  if (isOneOf(state, "UNKNOWN", "PAUSED")) {
    return Math.max(3, half);
  }

  return baseIntervalSeconds;
}
