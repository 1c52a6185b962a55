import { describe, expect, it, vi } from "vitest";
import { createInMemoryPricingCatalogRepo } from "@cid-ledger/db";
import { createLedgerServices, ensureDefaultPricing } from "./services";

const ENV = {
  DEPOSIT_ADDRESS: "TSimulatedDepositAddress",
  CHAIN_ADAPTER_MODE: "simulation",
  CHAIN_SIMULATION_AMOUNT: "50",
  CONVERSION_ADAPTER_MODE: "simulation",
};

describe("createLedgerServices", () => {
  it("wires in-memory storage and simulation adapters end to end", async () => {
    const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const services = createLedgerServices({ env: ENV, logger });
    const txHash = "a".repeat(64);

    await services.coordinator.submitDepositClaim({ accountId: "alice", txHash, expectedAmount: "50" });
    const outcome = await services.coordinator.processDepositClaim(txHash);
    const conversion = await services.coordinator.requestConversion({
      accountId: "alice",
      requestId: "req-1",
      installationId: "1234567".repeat(9),
    });

    expect(outcome).toMatchObject({ status: "credited", claim: { actualAmount: "50" } });
    expect(conversion).toMatchObject({ status: "finalized", debit: { reservedAmount: "0.1" } });
    expect(await services.ledgerRepo.getBalance("alice")).toBe("49.9");
  });

  it("refuses to start without a deposit address", () => {
    expect(() => createLedgerServices({ env: { ...ENV, DEPOSIT_ADDRESS: "" } })).toThrow("DEPOSIT_ADDRESS is required");
  });
});

describe("ensureDefaultPricing", () => {
  it("seeds an empty catalog once", async () => {
    const repo = createInMemoryPricingCatalogRepo();
    const now = new Date("2026-05-01T00:00:00.000Z");

    const seeded = await ensureDefaultPricing(repo, { now });
    const again = await ensureDefaultPricing(repo, { now });

    expect(seeded.version).toBe(1);
    expect(seeded.packages[0]).toMatchObject({ packageId: "single", cost: "0.1" });
    expect(again.version).toBe(1);
  });
});
