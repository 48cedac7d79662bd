/**
 * Task states and views of the TES API.
 *
 * The wire format carries states as plain strings so a server can introduce
 * new ones; `observeState` reads them into a closed union with an explicit
 * "unrecognized" branch instead of failing.
 */

export const TES_STATES = [
  "UNKNOWN",
  "QUEUED",
  "INITIALIZING",
  "RUNNING",
  "PAUSED",
  "COMPLETE",
  "EXECUTOR_ERROR",
  "SYSTEM_ERROR",
  "CANCELED",
  "PREEMPTED",
  "CANCELING",
] as const;

export type TesState = (typeof TES_STATES)[number];

export const TERMINAL_STATES: ReadonlySet<TesState> = new Set<TesState>([
  "COMPLETE",
  "EXECUTOR_ERROR",
  "SYSTEM_ERROR",
  "CANCELED",
]);

export type ObservedState =
  | { kind: "known"; value: TesState }
  | { kind: "unrecognized"; raw: string };

export const TES_VIEWS = ["MINIMAL", "BASIC", "FULL"] as const;

export type TesView = (typeof TES_VIEWS)[number];

export function isTesState(value: string): value is TesState {
  return (TES_STATES as readonly string[]).includes(value);
}

export function isTesView(value: string): value is TesView {
  return (TES_VIEWS as readonly string[]).includes(value);
}

/** A missing state reads as UNKNOWN, matching the server-side default. */
export function observeState(raw: string | null | undefined): ObservedState {
  if (raw === null || raw === undefined || raw === "") {
    return { kind: "known", value: "UNKNOWN" };
  }
  return isTesState(raw) ? { kind: "known", value: raw } : { kind: "unrecognized", raw };
}

export function stateLabel(state: ObservedState): string {
  return state.kind === "known" ? state.value : state.raw;
}

export function isTerminal(state: ObservedState): boolean {
  return state.kind === "known" && TERMINAL_STATES.has(state.value);
}

/** True when the observed state is one of the given known states. */
export function isOneOf(state: ObservedState, ...values: TesState[]): boolean {
  return state.kind === "known" && values.includes(state.value);
}
