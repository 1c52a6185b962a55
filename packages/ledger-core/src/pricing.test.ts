import { describe, expect, it } from "vitest";
import type { PricingSnapshot } from "@cid-ledger/db";
import { UnknownPackageError } from "./errors";
import { DEFAULT_PRICING_PACKAGES, PricingCatalogInputSchema, listActivePackages, priceOf } from "./pricing";

const SNAPSHOT: PricingSnapshot = {
  version: 7,
  packages: [
    { packageId: "single", name: "Single", unitCount: 1, cost: "0.2", active: true },
    { packageId: "bundle5", name: "Five pack", unitCount: 5, cost: "0.9", active: true },
    { packageId: "legacy", name: "Legacy", unitCount: 10, cost: "1.5", active: false },
  ],
};

describe("priceOf", () => {
  it("quotes a package with the snapshot version", () => {
    expect(priceOf(SNAPSHOT, " bundle5 ")).toEqual({
      packageId: "bundle5",
      name: "Five pack",
      unitCount: 5,
      cost: "0.9",
      catalogVersion: 7,
    });
  });

  it("refuses unknown and inactive packages", () => {
    expect(() => priceOf(SNAPSHOT, "missing")).toThrow(UnknownPackageError);
    try {
      priceOf(SNAPSHOT, "legacy");
      expect.unreachable();
    } catch (error) {
      expect(error).toMatchObject({ name: "UnknownPackageError", packageId: "legacy", catalogVersion: 7 });
    }
  });

  it("lists only active packages", () => {
    expect(listActivePackages(SNAPSHOT).map((item) => item.packageId)).toEqual(["single", "bundle5"]);
  });
});

describe("default pricing", () => {
  it("ships a single-conversion package and the bundles", () => {
    expect(DEFAULT_PRICING_PACKAGES).toHaveLength(8);
    expect(DEFAULT_PRICING_PACKAGES[0]).toEqual({ packageId: "single", name: "Single conversion", unitCount: 1, cost: "0.1" });
    expect(DEFAULT_PRICING_PACKAGES.find((item) => item.packageId === "bulk")).toMatchObject({
      unitCount: 10000,
      cost: "450.00",
    });
  });

  it("rejects malformed catalog input", () => {
    expect(PricingCatalogInputSchema.safeParse([]).success).toBe(false);
    expect(PricingCatalogInputSchema.safeParse([{ packageId: "x", name: "X", unitCount: 1.5, cost: "1" }]).success).toBe(
      false,
    );
  });
});
