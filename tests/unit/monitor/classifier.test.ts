import { describe, it, expect } from "vitest";
import {
  SIMPLIFIED_STATUSES,
  adaptiveInterval,
  classify,
} from "../../../src/monitor/classifier.js";
import { TES_STATES, observeState } from "../../../src/tes/state.js";

describe("classify", () => {
  it("returns a simplified status for every state, known or not", () => {
    const states = [...TES_STATES.map((s) => observeState(s)), observeState("ARCHIVED")];
    for (const state of states) {
      for (const elapsed of [0, 4.9, 5, 500]) {
        expect(SIMPLIFIED_STATUSES).toContain(classify(state, elapsed, 5));
      }
    }
  });

  it("flags a running task once it reaches the threshold", () => {
    expect(classify(observeState("RUNNING"), 4.9, 5)).toBe("still_running");
    expect(classify(observeState("RUNNING"), 5.0, 5)).toBe("still_running_timeout");
  });

  it("applies the threshold to queued and initializing tasks too", () => {
    expect(classify(observeState("QUEUED"), 11, 10)).toBe("still_running_timeout");
    expect(classify(observeState("INITIALIZING"), 1, 10)).toBe("still_running");
  });

  it("reports COMPLETE as success regardless of duration", () => {
    for (const elapsed of [0, 9.99, 10, 10_000]) {
      expect(classify(observeState("COMPLETE"), elapsed, 10)).toBe("completed_success");
    }
  });

  it("maps terminal and stalled states", () => {
    expect(classify(observeState("EXECUTOR_ERROR"), 1, 10)).toBe("completed_failed");
    expect(classify(observeState("SYSTEM_ERROR"), 1, 10)).toBe("completed_failed");
    expect(classify(observeState("CANCELED"), 1, 10)).toBe("canceled");
    expect(classify(observeState("PAUSED"), 1, 10)).toBe("error_state");
    expect(classify(observeState("PREEMPTED"), 1, 10)).toBe("error_state");
  });

  it("treats UNKNOWN, CANCELING and unrecognized states as unknown", () => {
    expect(classify(observeState("UNKNOWN"), 1, 10)).toBe("unknown_state");
    expect(classify(observeState("CANCELING"), 1, 10)).toBe("unknown_state");
    expect(classify(observeState("ARCHIVED"), 1, 10)).toBe("unknown_state");
  });
});

describe("adaptiveInterval", () => {
  it("checks quickly during the first minute", () => {
    expect(adaptiveInterval(observeState("RUNNING"), 0.5, 5)).toBe(2);
    expect(adaptiveInterval(observeState("QUEUED"), 0, 10)).toBe(5);
  });

  it("backs off in steps for running tasks", () => {
    expect(adaptiveInterval(observeState("RUNNING"), 3, 5)).toBe(5);
    expect(adaptiveInterval(observeState("RUNNING"), 5, 5)).toBe(10);
    expect(adaptiveInterval(observeState("INITIALIZING"), 14.9, 5)).toBe(10);
    expect(adaptiveInterval(observeState("RUNNING"), 15, 5)).toBe(15);
    expect(adaptiveInterval(observeState("RUNNING"), 600, 5)).toBe(15);
  });

  it("keeps the base interval for queued tasks", () => {
    for (const elapsed of [1, 10, 100]) {
      expect(adaptiveInterval(observeState("QUEUED"), elapsed, 5)).toBe(5);
    }
  });

  it("checks unknown and paused tasks at half the base, at least every 3 seconds", () => {
    expect(adaptiveInterval(observeState("UNKNOWN"), 2, 5)).toBe(3);
    expect(adaptiveInterval(observeState("PAUSED"), 2, 10)).toBe(5);
  });

  it("falls back to the base interval", () => {
    expect(adaptiveInterval(observeState("COMPLETE"), 2, 5)).toBe(5);
    expect(adaptiveInterval(observeState("ARCHIVED"), 2, 7)).toBe(7);
  });
});
