import { afterEach, describe, expect, it, vi } from "vitest";
import type { DepositClaimRecord } from "@cid-ledger/db";
import { runDepositDiscovery } from "./deposit-discovery";
import { runReservationSweep } from "./ledger-maintenance";
import { createWorkerRuntime } from "./worker-runtime";

function findEvent(entries: unknown[], event: string): Record<string, unknown> | undefined {
  return entries.find(
    (entry) =>
      typeof entry === "object" &&
      entry !== null &&
      (entry as Record<string, unknown>).event === event,
  ) as Record<string, unknown> | undefined;
}

describe("worker structured logging contract", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("emits structured startup/shutdown payloads", async () => {
    const logs: unknown[] = [];
    const errors: unknown[] = [];
    const warnings: unknown[] = [];
    vi.spyOn(console, "log").mockImplementation((...args) => {
      logs.push(args[0]);
    });
    vi.spyOn(console, "error").mockImplementation((...args) => {
      errors.push(args[0]);
    });
    vi.spyOn(console, "warn").mockImplementation((...args) => {
      warnings.push(args[0]);
    });

    const runtime = createWorkerRuntime({
      tickIntervalMs: 1000,
      shutdownTimeoutMs: 100,
      jobs: [{ name: "deposits", intervalMs: 1000, run: async () => undefined }],
      exitFn: () => undefined,
      setIntervalFn: () => 1 as unknown as ReturnType<typeof setInterval>,
      clearIntervalFn: () => undefined,
    });
    await runtime.start();
    await runtime.shutdown("manual");

    expect(findEvent(logs, "worker.runtime.started")).toMatchObject({
      component: "worker-runtime",
      event: "worker.runtime.started",
      severity: "info",
      jobs: [{ name: "deposits", intervalMs: 1000 }],
    });
    expect(findEvent(logs, "worker.runtime.shutdown")).toMatchObject({
      component: "worker-runtime",
      event: "worker.runtime.shutdown",
      severity: "info",
      signal: "manual",
      exitCode: 0,
    });
    expect(errors).toEqual([]);
    expect(warnings).toEqual([]);
  });

  it("emits claim failures with the transaction hash as correlation id", async () => {
    const logs: unknown[] = [];
    const errors: unknown[] = [];
    vi.spyOn(console, "log").mockImplementation((...args) => {
      logs.push(args[0]);
    });
    vi.spyOn(console, "error").mockImplementation((...args) => {
      errors.push(args[0]);
    });
    const now = new Date("2026-05-01T00:00:00.000Z");
    const claim: DepositClaimRecord = {
      id: "claim-log",
      txHash: "f00d",
      accountId: "u-log",
      expectedAmount: "25",
      packageId: null,
      actualAmount: null,
      status: "pending",
      rejectionReason: null,
      lastVerdict: null,
      lastError: null,
      attemptCount: 0,
      nextAttemptAt: now,
      createdAt: now,
      updatedAt: now,
      verifiedAt: null,
      creditedAt: null,
    };

    await runDepositDiscovery({
      limit: 5,
      coordinator: { processDepositClaim: vi.fn().mockRejectedValue(new Error("lookup exploded")) },
      depositClaimRepo: { listDue: vi.fn().mockResolvedValue([claim]) },
    });

    expect(findEvent(errors, "deposit.discovery.claim_failed")).toMatchObject({
      component: "deposit-discovery",
      severity: "error",
      txHash: "f00d",
      accountId: "u-log",
      error: "lookup exploded",
    });
    expect(findEvent(logs, "deposit.discovery.summary")).toMatchObject({
      component: "deposit-discovery",
      severity: "info",
      scanned: 1,
      errors: 1,
    });
  });

  it("emits the sweep summary under the maintenance component", async () => {
    const logs: unknown[] = [];
    vi.spyOn(console, "log").mockImplementation((...args) => {
      logs.push(args[0]);
    });

    await runReservationSweep({
      coordinator: {
        releaseStaleReservations: vi.fn().mockResolvedValue({ released: ["req-1"], skipped: [], failed: [] }),
      },
      olderThanMs: 1000,
      limit: 10,
    });

    expect(findEvent(logs, "conversion.sweep.summary")).toMatchObject({
      component: "ledger-maintenance",
      severity: "info",
      released: 1,
      skipped: 0,
      failed: 0,
    });
  });
});
