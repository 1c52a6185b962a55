import { createDbClient, createDbDepositClaimRepo } from "@cid-ledger/db";
import { createComponentLogger, errorMessage } from "@cid-ledger/ledger-core";

const logger = createComponentLogger("worker-healthcheck");

type CheckResult =
  | { status: "ok"; latencyMs: number }
  | { status: "error"; message: string }
  | { status: "skipped"; message: string };

function readTimeoutMs(): number {
  const raw = process.env.WORKER_READINESS_TIMEOUT_MS ?? "5000";
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`Invalid WORKER_READINESS_TIMEOUT_MS: ${raw}`);
  }
  return value;
}

async function timed(probe: () => Promise<void>): Promise<CheckResult> {
  const startedAt = Date.now();
  try {
    await probe();
    return { status: "ok", latencyMs: Date.now() - startedAt };
  } catch (error) {
    return { status: "error", message: errorMessage(error) };
  }
}

async function checkDatabase(databaseUrl: string | undefined): Promise<CheckResult> {
  if (!databaseUrl) {
    return { status: "skipped", message: "DATABASE_URL is not set" };
  }
  // The deposit scan is the first query the worker runs on every tick.
  return timed(async () => {
    await createDbDepositClaimRepo(createDbClient(databaseUrl)).listDue(new Date(), { limit: 1 });
  });
}

async function checkChainApi(endpoint: string | undefined, timeoutMs: number): Promise<CheckResult> {
  if (!endpoint) {
    return { status: "skipped", message: "CHAIN_API_URL is not set" };
  }
  return timed(async () => {
    const response = await fetch(endpoint, { method: "GET", signal: AbortSignal.timeout(timeoutMs) });
    if (response.status >= 500) {
      throw new Error(`HTTP ${response.status}`);
    }
  });
}

async function main() {
  const timeoutMs = readTimeoutMs();
  const [database, chainApi] = await Promise.all([
    checkDatabase(process.env.DATABASE_URL?.trim()),
    checkChainApi(process.env.CHAIN_API_URL?.trim(), timeoutMs),
  ]);
  const checks = { database, chainApi };
  const ready = Object.values(checks).every((item) => item.status !== "error");

  if (!ready) {
    logger.error("worker.healthcheck.not_ready", { checks });
    process.exitCode = 1;
    return;
  }
  logger.info("worker.healthcheck.ready", { checks });
}

void main().catch((error) => {
  logger.error("worker.healthcheck.failed", { error: errorMessage(error) });
  process.exit(1);
});
