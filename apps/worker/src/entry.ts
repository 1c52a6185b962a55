import { createDbClient } from "@cid-ledger/db";
import { createComponentLogger, createLedgerServices, ensureDefaultPricing } from "@cid-ledger/ledger-core";
import { parseWorkerConfig } from "./config";
import { runDepositDiscovery } from "./deposit-discovery";
import { runLedgerReconciliation, runReservationSweep } from "./ledger-maintenance";
import { createWorkerRuntime } from "./worker-runtime";

const logger = createComponentLogger("worker");

async function main() {
  const config = parseWorkerConfig(process.env);
  const databaseUrl = process.env.DATABASE_URL?.trim();
  if (!databaseUrl) {
    logger.warn("worker.storage.in_memory", { reason: "DATABASE_URL is not set" });
  }
  const services = createLedgerServices({ env: process.env, db: databaseUrl ? createDbClient(databaseUrl) : null });
  await ensureDefaultPricing(services.pricingCatalogRepo, { now: new Date(), logger });

  const runtime = createWorkerRuntime({
    tickIntervalMs: Math.min(config.depositIntervalMs, config.sweepIntervalMs, config.reconciliationIntervalMs),
    shutdownTimeoutMs: config.shutdownTimeoutMs,
    jobs: [
      {
        name: "deposits",
        intervalMs: config.depositIntervalMs,
        run: async ({ signal }) => {
          const { events: _events, ...summary } = await runDepositDiscovery({
            limit: config.depositBatchSize,
            coordinator: services.coordinator,
            depositClaimRepo: services.depositClaimRepo,
            signal,
          });
          return summary;
        },
      },
      {
        name: "reservation-sweep",
        intervalMs: config.sweepIntervalMs,
        run: () =>
          runReservationSweep({
            coordinator: services.coordinator,
            olderThanMs: config.reservationTimeoutMs,
            limit: config.depositBatchSize,
          }),
      },
      {
        name: "reconciliation",
        intervalMs: config.reconciliationIntervalMs,
        run: async () => {
          const result = await runLedgerReconciliation({
            repos: services,
            coordinator: services.coordinator,
            repair: config.reconciliationRepair,
          });
          return { issues: result.report.issues.length };
        },
      },
    ],
  });

  process.once("SIGINT", () => {
    void runtime.shutdown("SIGINT");
  });
  process.once("SIGTERM", () => {
    void runtime.shutdown("SIGTERM");
  });

  await runtime.start();
}

void main().catch((error) => {
  logger.error("worker.startup_failed", { error });
  process.exit(1);
});
