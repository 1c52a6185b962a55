import { z } from "zod";
import type { PricingPackageInput, PricingPackageRecord, PricingSnapshot } from "@cid-ledger/db";
import defaultPricing from "../data/default-pricing.json";
import { UnknownPackageError } from "./errors";

export type PackageQuote = {
  packageId: string;
  name: string;
  unitCount: number;
  cost: string;
  catalogVersion: number;
};

const PricingPackageInputSchema = z.object({
  packageId: z.string().min(1),
  name: z.string(),
  unitCount: z.number().int().positive(),
  cost: z.string().min(1),
  active: z.boolean().optional(),
});

export const PricingCatalogInputSchema = z.array(PricingPackageInputSchema).min(1);

export const DEFAULT_PRICING_PACKAGES: PricingPackageInput[] = PricingCatalogInputSchema.parse(defaultPricing);

export function listActivePackages(snapshot: PricingSnapshot): PricingPackageRecord[] {
  return snapshot.packages.filter((item) => item.active);
}

/** Prices a package against one explicit snapshot; inactive packages are not for sale. */
export function priceOf(snapshot: PricingSnapshot, packageId: string): PackageQuote {
  const match = snapshot.packages.find((item) => item.packageId === packageId.trim());
  if (!match || !match.active) {
    throw new UnknownPackageError(packageId, snapshot.version);
  }
  return {
    packageId: match.packageId,
    name: match.name,
    unitCount: match.unitCount,
    cost: match.cost,
    catalogVersion: snapshot.version,
  };
}
