import { describe, it, expect, vi } from "vitest";
import {
  RETRYABLE_STATUSES,
  backoffMs,
  fetchWithRetry,
  isTransientError,
  type RetryPolicy,
} from "../../../src/tes/retry.js";
import { createMockLogger, textResponse } from "../../helpers/mocks.js";

function policy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  return {
    maxRetries: 3,
    backoffFactor: 1,
    retryableStatuses: RETRYABLE_STATUSES,
    ...overrides,
  };
}

describe("backoffMs", () => {
  it("doubles with every retry", () => {
    expect(backoffMs(policy(), 1)).toBe(1000);
    expect(backoffMs(policy(), 2)).toBe(2000);
    expect(backoffMs(policy(), 3)).toBe(4000);
    expect(backoffMs(policy({ backoffFactor: 0.5 }), 2)).toBe(1000);
  });

  it("caps the wait at two minutes", () => {
    expect(backoffMs(policy({ backoffFactor: 100 }), 3)).toBe(120_000);
  });
});

describe("fetchWithRetry", () => {
  it("retries retryable statuses until a response succeeds", async () => {
    const attempt = vi
      .fn<() => Promise<Response>>()
      .mockResolvedValueOnce(textResponse(503, "busy"))
      .mockResolvedValueOnce(textResponse(429, "slow down"))
      .mockResolvedValueOnce(textResponse(200, "ok"));
    const sleep = vi.fn(async (_ms: number) => {});

    const res = await fetchWithRetry(attempt, policy(), createMockLogger(), sleep);

    expect(res.status).toBe(200);
    expect(attempt).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[1000], [2000]]);
  });

  it("returns the last response once retries run out", async () => {
    const attempt = vi.fn(async () => textResponse(502, "bad gateway"));
    const sleep = vi.fn(async (_ms: number) => {});

    const res = await fetchWithRetry(attempt, policy({ maxRetries: 2 }), createMockLogger(), sleep);

    expect(res.status).toBe(502);
    expect(await res.text()).toBe("bad gateway");
    expect(attempt).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it("does not retry other statuses", async () => {
    const attempt = vi.fn(async () => textResponse(400, "bad request"));
    const sleep = vi.fn(async (_ms: number) => {});

    const res = await fetchWithRetry(attempt, policy(), createMockLogger(), sleep);

    expect(res.status).toBe(400);
    expect(attempt).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("retries network failures", async () => {
    const attempt = vi
      .fn<() => Promise<Response>>()
      .mockRejectedValueOnce(new TypeError("fetch failed"))
      .mockResolvedValueOnce(textResponse(200, "ok"));
    const sleep = vi.fn(async (_ms: number) => {});

    const res = await fetchWithRetry(attempt, policy(), createMockLogger(), sleep);

    expect(res.status).toBe(200);
    expect(sleep).toHaveBeenCalledWith(1000);
  });

  it("rethrows a network failure once retries run out", async () => {
    const attempt = vi.fn(async (): Promise<Response> => {
      throw new TypeError("fetch failed");
    });
    const sleep = vi.fn(async (_ms: number) => {});

    await expect(
      fetchWithRetry(attempt, policy({ maxRetries: 1 }), createMockLogger(), sleep)
    ).rejects.toThrow("fetch failed");
    expect(attempt).toHaveBeenCalledTimes(2);
  });

  it("rethrows errors that are not transient without retrying", async () => {
    const attempt = vi.fn(async (): Promise<Response> => {
      throw new Error("boom");
    });
    const sleep = vi.fn(async (_ms: number) => {});

    await expect(fetchWithRetry(attempt, policy(), createMockLogger(), sleep)).rejects.toThrow(
      "boom"
    );
    expect(attempt).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("makes a single attempt when retries are disabled", async () => {
    const attempt = vi.fn(async () => textResponse(503, "busy"));
    const sleep = vi.fn(async (_ms: number) => {});

    const res = await fetchWithRetry(attempt, policy({ maxRetries: 0 }), createMockLogger(), sleep);

    expect(res.status).toBe(503);
    expect(attempt).toHaveBeenCalledTimes(1);
  });
});

describe("isTransientError", () => {
  it("recognizes timeouts and connection failures", () => {
    expect(isTransientError(Object.assign(new Error("aborted"), { name: "AbortError" }))).toBe(true);
    expect(isTransientError(new TypeError("fetch failed"))).toBe(true);
    expect(isTransientError(Object.assign(new Error("refused"), { code: "ECONNREFUSED" }))).toBe(
      true
    );
    expect(isTransientError(Object.assign(new Error("reset"), { code: "ECONNRESET" }))).toBe(true);
  });

  it("rejects everything else", () => {
    expect(isTransientError(new Error("boom"))).toBe(false);
    expect(isTransientError(Object.assign(new Error("denied"), { code: "EACCES" }))).toBe(false);
    expect(isTransientError("fetch failed")).toBe(false);
    expect(isTransientError(new TypeError("Failed to parse URL from not-a-url/tasks"))).toBe(false);
    expect(isTransientError(new TypeError("Cannot read properties of undefined"))).toBe(false);
  });
});
