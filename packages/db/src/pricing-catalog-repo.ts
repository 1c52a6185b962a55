import { asc, eq, sql } from "drizzle-orm";
import { assertPositiveAmount, normalizeDecimal } from "./amount";
import { isUniqueViolation, type DbClient } from "./client";
import { pricingPackages } from "./schema";

export type PricingPackageInput = {
  packageId: string;
  name: string;
  unitCount: number;
  cost: string;
  active?: boolean;
};

export type PricingPackageRecord = {
  packageId: string;
  name: string;
  unitCount: number;
  cost: string;
  active: boolean;
};

/** One immutable generation of the catalog. Version 0 means nothing was ever stored. */
export type PricingSnapshot = {
  version: number;
  packages: PricingPackageRecord[];
};

export class InvalidPricingCatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidPricingCatalogError";
  }
}

export class PricingCatalogConflictError extends Error {
  constructor(public readonly version: number) {
    super(`pricing catalog version ${version} was written concurrently`);
    this.name = "PricingCatalogConflictError";
  }
}

export type PricingCatalogRepo = {
  loadSnapshot(): Promise<PricingSnapshot>;
  replaceAll(packages: PricingPackageInput[], params: { now: Date; createdBy?: string | null }): Promise<PricingSnapshot>;
  __resetForTests?: () => void;
};

function normalizePackages(packages: PricingPackageInput[]): PricingPackageRecord[] {
  if (packages.length === 0) {
    throw new InvalidPricingCatalogError("pricing catalog must contain at least one package");
  }
  const seen = new Set<string>();
  const normalized = packages.map((item) => {
    const packageId = item.packageId.trim();
    if (!packageId) {
      throw new InvalidPricingCatalogError("package id must not be empty");
    }
    if (seen.has(packageId)) {
      throw new InvalidPricingCatalogError(`duplicate package id: ${packageId}`);
    }
    seen.add(packageId);
    if (!Number.isInteger(item.unitCount) || item.unitCount < 1) {
      throw new InvalidPricingCatalogError(`invalid unit count for ${packageId}: ${item.unitCount}`);
    }
    assertPositiveAmount(item.cost);
    return {
      packageId,
      name: item.name.trim() || packageId,
      unitCount: item.unitCount,
      cost: normalizeDecimal(item.cost),
      active: item.active ?? true,
    };
  });
  return normalized.sort(
    (a, b) => a.unitCount - b.unitCount || (a.packageId < b.packageId ? -1 : a.packageId > b.packageId ? 1 : 0),
  );
}

function cloneSnapshot(snapshot: PricingSnapshot): PricingSnapshot {
  return { version: snapshot.version, packages: snapshot.packages.map((item) => ({ ...item })) };
}

export function createDbPricingCatalogRepo(db: DbClient): PricingCatalogRepo {
  return {
    async loadSnapshot() {
      const [latest] = await db
        .select({ version: sql<number | null>`MAX(${pricingPackages.catalogVersion})` })
        .from(pricingPackages);
      const version = Number(latest?.version ?? 0);
      if (version === 0) {
        return { version: 0, packages: [] };
      }

      const rows = await db
        .select()
        .from(pricingPackages)
        .where(eq(pricingPackages.catalogVersion, version))
        .orderBy(asc(pricingPackages.unitCount), asc(pricingPackages.packageId));
      return {
        version,
        packages: rows.map((row) => ({
          packageId: row.packageId,
          name: row.name,
          unitCount: row.unitCount,
          cost: normalizeDecimal(row.cost),
          active: row.active,
        })),
      };
    },

    async replaceAll(packages, params) {
      const normalized = normalizePackages(packages);
      let nextVersion = 0;
      try {
        return await db.transaction(async (tx): Promise<PricingSnapshot> => {
          const [latest] = await tx
            .select({ version: sql<number | null>`MAX(${pricingPackages.catalogVersion})` })
            .from(pricingPackages);
          nextVersion = Number(latest?.version ?? 0) + 1;
          await tx.insert(pricingPackages).values(
            normalized.map((item) => ({
              catalogVersion: nextVersion,
              packageId: item.packageId,
              name: item.name,
              unitCount: item.unitCount,
              cost: item.cost,
              active: item.active,
              createdBy: params.createdBy ?? null,
              createdAt: params.now,
            })),
          );
          return { version: nextVersion, packages: normalized };
        });
      } catch (err) {
        if (isUniqueViolation(err)) {
          throw new PricingCatalogConflictError(nextVersion);
        }
        throw err;
      }
    },
  };
}

export function createInMemoryPricingCatalogRepo(seed?: PricingPackageInput[]): PricingCatalogRepo {
  const initial: PricingSnapshot = seed ? { version: 1, packages: normalizePackages(seed) } : { version: 0, packages: [] };
  let current = cloneSnapshot(initial);

  return {
    async loadSnapshot() {
      return cloneSnapshot(current);
    },

    async replaceAll(packages) {
      current = { version: current.version + 1, packages: normalizePackages(packages) };
      return cloneSnapshot(current);
    },

    __resetForTests() {
      current = cloneSnapshot(initial);
    },
  };
}
