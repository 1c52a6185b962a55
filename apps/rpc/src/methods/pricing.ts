import type { TransactionCoordinator } from "@cid-ledger/ledger-core";

type HandlePricingListOptions = {
  coordinator: Pick<TransactionCoordinator, "listPackages">;
};

export async function handlePricingList(options: HandlePricingListOptions) {
  const snapshot = await options.coordinator.listPackages();
  return {
    catalogVersion: snapshot.version,
    packages: snapshot.packages.map((item) => ({
      packageId: item.packageId,
      name: item.name,
      unitCount: item.unitCount,
      cost: item.cost,
    })),
  };
}
