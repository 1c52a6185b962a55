import { createDbClient } from "@cid-ledger/db";
import { createComponentLogger, createLedgerServices } from "@cid-ledger/ledger-core";
import { runLedgerReconciliation } from "../ledger-maintenance";

type ReconcileArgs = {
  repair: boolean;
  pageSize: number;
};

function parseArgs(argv: string[]): ReconcileArgs {
  const args: ReconcileArgs = { repair: false, pageSize: 200 };

  for (const token of argv) {
    if (token === "--repair") {
      args.repair = true;
      continue;
    }
    if (token.startsWith("--page-size=")) {
      const value = Number(token.slice("--page-size=".length));
      if (!Number.isInteger(value) || value <= 0) {
        throw new Error(`Invalid --page-size: ${token.slice("--page-size=".length)}`);
      }
      args.pageSize = value;
      continue;
    }

    throw new Error(`Unknown argument: ${token}`);
  }

  return args;
}

async function main() {
  const { repair, pageSize } = parseArgs(process.argv.slice(2));
  const services = createLedgerServices({ env: process.env, db: createDbClient() });

  const result = await runLedgerReconciliation({
    repos: services,
    coordinator: services.coordinator,
    repair,
    pageSize,
    logger: createComponentLogger("reconcile-ledger"),
  });

  console.log(JSON.stringify(result, null, 2));
  const unrepaired = result.report.issues.filter(
    (issue) =>
      !repair || (issue.kind !== "voucher_credit_missing" && issue.kind !== "conversion_refund_missing"),
  );
  if (unrepaired.length > 0) {
    process.exitCode = 2;
  }
}

void main().catch((error) => {
  console.error("[reconcile-ledger] failed", error);
  process.exit(1);
});
