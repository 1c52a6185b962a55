import { describe, expect, it } from "vitest";
import { DEFAULT_RETRY_POLICY, assertRetryPolicy, computeBackoffDelayMs } from "./retry-policy";

describe("computeBackoffDelayMs", () => {
  it("doubles from the initial delay and caps at the maximum", () => {
    expect([1, 2, 3, 4, 5, 6].map((attempt) => computeBackoffDelayMs(DEFAULT_RETRY_POLICY, attempt))).toEqual([
      500, 1000, 2000, 4000, 8000, 8000,
    ]);
  });

  it("keeps a flat delay with multiplier 1", () => {
    const policy = { maxAttempts: 3, initialDelayMs: 250, maxDelayMs: 1000, multiplier: 1 };
    expect(computeBackoffDelayMs(policy, 3)).toBe(250);
  });
});

describe("assertRetryPolicy", () => {
  it("rejects policies that can never attempt", () => {
    expect(() => assertRetryPolicy({ ...DEFAULT_RETRY_POLICY, maxAttempts: 0 })).toThrow(
      "Invalid retry policy: maxAttempts must be an integer >= 1",
    );
    expect(() => assertRetryPolicy({ ...DEFAULT_RETRY_POLICY, maxDelayMs: 100 })).toThrow(
      "Invalid retry policy: expected 0 <= initialDelayMs <= maxDelayMs",
    );
  });
});
