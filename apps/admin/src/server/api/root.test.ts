import { describe, expect, it, vi } from "vitest";
import { createLedgerServices } from "@cid-ledger/ledger-core";
import { adminRouter } from "./root";
import type { TrpcContext } from "./trpc";

const NOW = new Date("2026-05-01T10:00:00.000Z");

function setup() {
  const services = createLedgerServices({
    env: { DEPOSIT_ADDRESS: "TDepositAddress" },
    chainAdapter: { lookupTransaction: vi.fn() },
    conversionProvider: { convert: vi.fn() },
    logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn() },
    nowFn: () => NOW,
  });
  const superAdmin = adminRouter.createCaller({
    role: "SUPER_ADMIN",
    adminUserId: "admin-1",
    coordinator: services.coordinator,
  } satisfies TrpcContext);
  const operator = adminRouter.createCaller({
    role: "OPERATOR",
    adminUserId: "operator-1",
    coordinator: services.coordinator,
  } satisfies TrpcContext);
  return { services, superAdmin, operator };
}

describe("admin router", () => {
  it("creates a voucher batch and reports stats", async () => {
    const { superAdmin, operator } = setup();

    const batch = await superAdmin.vouchers.create({ count: 3, value: "5.00", prefix: "SPRING", expiresInDays: 30 });
    const stats = await operator.vouchers.stats();

    expect(batch.codes).toHaveLength(3);
    expect(new Set(batch.codes).size).toBe(3);
    for (const code of batch.codes) {
      expect(code.startsWith("SPRING")).toBe(true);
    }
    expect(batch.value).toBe("5");
    expect(batch.expiresAt).toEqual(new Date("2026-05-31T10:00:00.000Z"));
    expect(stats).toEqual({ total: 3, used: 0, unused: 3, expiredUnused: 0, usedValue: "0", unusedValue: "15" });
  });

  it("rejects voucher creation for operators and out-of-range batches", async () => {
    const { superAdmin, operator } = setup();

    await expect(operator.vouchers.create({ count: 1, value: "5" })).rejects.toMatchObject({ code: "FORBIDDEN" });
    await expect(superAdmin.vouchers.create({ count: 101, value: "5" })).rejects.toMatchObject({ code: "BAD_REQUEST" });
    await expect(superAdmin.vouchers.create({ count: 2, value: "5", customCode: "SAVE20" })).rejects.toMatchObject({
      code: "BAD_REQUEST",
      message: "a custom voucher code can only be used for a single voucher",
    });
  });

  it("reports a duplicate custom code as a conflict", async () => {
    const { superAdmin } = setup();
    await superAdmin.vouchers.create({ count: 1, value: "20", customCode: "SAVE20" });

    await expect(superAdmin.vouchers.create({ count: 1, value: "20", customCode: "save20" })).rejects.toMatchObject({
      code: "CONFLICT",
      message: "voucher code already exists: SAVE20",
    });
  });

  it("adjusts balances once per adjustment id and audits the actor", async () => {
    const { superAdmin, operator } = setup();
    const input = { accountId: "alice", adjustmentId: "adj-1", amount: "25", note: "goodwill credit" };

    const first = await superAdmin.accounts.adjustBalance(input);
    const repeated = await superAdmin.accounts.adjustBalance(input);
    const events = await operator.accounts.events({ accountId: "alice" });

    expect(first).toMatchObject({ applied: true, balance: "25" });
    expect(repeated).toMatchObject({ applied: false, balance: "25" });
    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({
      kind: "adjustment",
      amount: "25",
      externalReference: "adj-1",
      metadata: { actor: "admin-1", note: "goodwill credit" },
    });
  });

  it("refuses a debit adjustment the balance cannot cover", async () => {
    const { superAdmin } = setup();

    await expect(
      superAdmin.accounts.adjustBalance({ accountId: "alice", adjustmentId: "adj-2", amount: "-3", note: "chargeback" }),
    ).rejects.toMatchObject({ code: "PRECONDITION_FAILED", message: "balance 0 cannot cover 3" });
  });

  it("suspends and reactivates accounts", async () => {
    const { superAdmin, operator } = setup();

    const suspended = await operator.accounts.suspend({ accountId: "alice", reason: "chargeback" });
    const balance = await operator.accounts.balance({ accountId: "alice" });

    expect(suspended).toEqual({ accountId: "alice", status: "suspended", suspendedReason: "chargeback" });
    expect(balance).toEqual({ accountId: "alice", balance: "0", status: "suspended" });
    await expect(operator.accounts.reactivate({ accountId: "alice" })).rejects.toMatchObject({ code: "FORBIDDEN" });
    expect(await superAdmin.accounts.reactivate({ accountId: "alice" })).toMatchObject({ status: "active" });
  });

  it("replaces the pricing catalog wholesale", async () => {
    const { superAdmin, operator } = setup();

    const replaced = await superAdmin.pricing.replace({
      packages: [
        { packageId: "single", name: "Single conversion", unitCount: 1, cost: "0.15" },
        { packageId: "small", name: "Small pack", unitCount: 30, cost: "3.5" },
      ],
    });
    const listed = await operator.pricing.list();

    expect(replaced.version).toBe(2);
    expect(listed).toEqual({
      version: 2,
      packages: [
        { packageId: "single", name: "Single conversion", unitCount: 1, cost: "0.15", active: true },
        { packageId: "small", name: "Small pack", unitCount: 30, cost: "3.5", active: true },
      ],
    });
    await expect(
      superAdmin.pricing.replace({
        packages: [
          { packageId: "single", name: "A", unitCount: 1, cost: "1" },
          { packageId: "single", name: "B", unitCount: 2, cost: "2" },
        ],
      }),
    ).rejects.toMatchObject({ code: "BAD_REQUEST", message: "duplicate package id: single" });
  });

  it("retries the credit of a verified deposit claim", async () => {
    const { services, operator } = setup();
    await services.coordinator.submitDepositClaim({ accountId: "alice", txHash: "abc123", expectedAmount: "50" });
    await services.depositClaimRepo.markVerified("abc123", { now: NOW, actualAmount: "50", verdict: "confirmed:50" });

    const retried = await operator.deposits.retryCredit({ txHash: "abc123" });
    const again = await operator.deposits.retryCredit({ txHash: "abc123" });

    expect(retried).toEqual({ status: "credited", claimStatus: "credited", lastError: null });
    expect(again).toEqual({ status: "already_final", claimStatus: "credited", lastError: null });
    expect(await services.ledgerRepo.getBalance("alice")).toBe("50");
  });

  it("maps claim lookups and pending retries to tRPC errors", async () => {
    const { services, operator } = setup();
    await services.coordinator.submitDepositClaim({ accountId: "alice", txHash: "def456", expectedAmount: "50" });

    await expect(operator.deposits.status({ txHash: "nope" })).rejects.toMatchObject({ code: "NOT_FOUND" });
    await expect(operator.deposits.retryCredit({ txHash: "def456" })).rejects.toMatchObject({ code: "CONFLICT" });
  });

  it("requires a role, an actor and configured services", async () => {
    const { services } = setup();
    const anonymous = adminRouter.createCaller({ coordinator: services.coordinator });
    const noActor = adminRouter.createCaller({ role: "SUPER_ADMIN", coordinator: services.coordinator });
    const unconfigured = adminRouter.createCaller({ role: "OPERATOR" });

    await expect(anonymous.vouchers.stats()).rejects.toMatchObject({ code: "FORBIDDEN" });
    await expect(noActor.pricing.replace({ packages: [{ packageId: "x", name: "X", unitCount: 1, cost: "1" }] })).rejects.toMatchObject({
      code: "INTERNAL_SERVER_ERROR",
      message: "Admin identity not configured",
    });
    await expect(unconfigured.vouchers.stats()).rejects.toMatchObject({
      code: "INTERNAL_SERVER_ERROR",
      message: "Ledger services not configured",
    });
  });
});
