import { createComponentLogger, errorMessage } from "@cid-ledger/ledger-core";
import { z } from "zod";

const logger = createComponentLogger("rpc-healthcheck");

const ReadinessBodySchema = z.object({
  status: z.enum(["ready", "not_ready"]),
  checks: z.record(z.object({ status: z.enum(["ok", "error"]), message: z.string().optional() })),
});

function readPositiveInt(name: string, fallback: string, max = Number.MAX_SAFE_INTEGER): number {
  const raw = process.env[name] ?? fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0 || value > max) {
    throw new Error(`Invalid ${name}: ${raw}`);
  }
  return value;
}

async function main() {
  const port = readPositiveInt("RPC_PORT", "3000", 65535);
  const timeoutMs = readPositiveInt("RPC_HEALTHCHECK_TIMEOUT_MS", "3000");

  const response = await fetch(`http://127.0.0.1:${port}/healthz/ready`, {
    signal: AbortSignal.timeout(timeoutMs),
  });
  const parsed = ReadinessBodySchema.safeParse(await response.json());
  if (!parsed.success) {
    throw new Error(`unexpected readiness body: HTTP ${response.status}`);
  }
  const failing = Object.entries(parsed.data.checks)
    .filter(([, check]) => check.status === "error")
    .map(([name, check]) => ({ name, message: check.message ?? null }));

  if (!response.ok || parsed.data.status !== "ready") {
    logger.error("rpc.healthcheck.not_ready", { httpStatus: response.status, failing });
    process.exitCode = 1;
    return;
  }
  logger.info("rpc.healthcheck.ready", { checks: Object.keys(parsed.data.checks) });
}

void main().catch((error) => {
  logger.error("rpc.healthcheck.failed", { error: errorMessage(error) });
  process.exit(1);
});
