import { afterEach, describe, expect, it, vi } from "vitest";
import { createComponentLogger, errorMessage, parseLogSeverity, toJsonSafe } from "./logger";

describe("createComponentLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("writes structured payloads to the matching console channel", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const logger = createComponentLogger("coordinator", { env: {} });

    logger.info("deposit.credited", { txHash: "abc", amount: 50n });
    logger.warn("deposit.credit.retry", { txHash: "abc", attempt: 1 });
    logger.error("voucher.credit.failed", { code: "SAVE20", error: new TypeError("db down") });

    expect(log).toHaveBeenCalledWith({
      component: "coordinator",
      event: "deposit.credited",
      severity: "info",
      txHash: "abc",
      amount: "50",
    });
    expect(warn).toHaveBeenCalledWith({
      component: "coordinator",
      event: "deposit.credit.retry",
      severity: "warn",
      txHash: "abc",
      attempt: 1,
    });
    expect(error.mock.calls[0]?.[0]).toMatchObject({
      component: "coordinator",
      event: "voucher.credit.failed",
      severity: "error",
      code: "SAVE20",
      error: { name: "TypeError", message: "db down" },
    });
  });
});

describe("log severity threshold", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("drops events below LOG_LEVEL", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const logger = createComponentLogger("worker", { env: { LOG_LEVEL: "WARN" } });

    logger.info("worker.job.completed", { job: "deposits" });
    logger.warn("worker.runtime.tick_skipped");

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith({ component: "worker", event: "worker.runtime.tick_skipped", severity: "warn" });
  });

  it("parses known levels and rejects others", () => {
    expect(parseLogSeverity(undefined)).toBe("info");
    expect(parseLogSeverity("debug")).toBe("info");
    expect(parseLogSeverity(" error ")).toBe("error");
    expect(() => parseLogSeverity("verbose")).toThrow("Invalid LOG_LEVEL 'verbose'. Expected one of: info, warn, error.");
  });
});

describe("toJsonSafe", () => {
  it("keeps driver error codes", () => {
    const error = Object.assign(new Error("duplicate key"), { code: "23505" });

    expect(toJsonSafe({ error })).toMatchObject({ error: { name: "Error", message: "duplicate key", code: "23505" } });
  });

  it("falls back to a string for circular values", () => {
    const value: Record<string, unknown> = {};
    value.self = value;

    expect(toJsonSafe(value)).toBe("[object Object]");
  });
});

describe("errorMessage", () => {
  it("reads messages from errors and other values", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage(503)).toBe("503");
  });
});
