export type WorkerConfig = {
  depositIntervalMs: number;
  depositBatchSize: number;
  sweepIntervalMs: number;
  reservationTimeoutMs: number;
  reconciliationIntervalMs: number;
  reconciliationRepair: boolean;
  shutdownTimeoutMs: number;
};

function parseInteger(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number,
  min: number,
): number {
  const raw = env[name];
  const value = raw === undefined ? fallback : Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`Invalid ${name}: expected integer >= ${min}`);
  }
  return value;
}

function parseBoolean(env: NodeJS.ProcessEnv, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (raw === undefined) {
    return fallback;
  }
  const normalized = raw.trim().toLowerCase();
  if (normalized === "true" || normalized === "1") {
    return true;
  }
  if (normalized === "false" || normalized === "0") {
    return false;
  }
  throw new Error(`Invalid ${name}: expected one of true, false, 1, 0, received "${normalized}"`);
}

export function parseWorkerConfig(env: NodeJS.ProcessEnv = process.env): WorkerConfig {
  const depositIntervalMs = parseInteger(env, "WORKER_INTERVAL_MS", 30_000, 1);
  const depositBatchSize = parseInteger(env, "WORKER_DEPOSIT_BATCH_SIZE", 200, 1);
  const sweepIntervalMs = parseInteger(env, "WORKER_SWEEP_INTERVAL_MS", 60_000, 1);
  const reservationTimeoutMs = parseInteger(env, "WORKER_RESERVATION_TIMEOUT_MS", 15 * 60_000, 1);
  const reconciliationIntervalMs = parseInteger(env, "WORKER_RECONCILIATION_INTERVAL_MS", 60 * 60_000, 1);
  const reconciliationRepair = parseBoolean(env, "WORKER_RECONCILIATION_REPAIR", true);
  const shutdownTimeoutMs = parseInteger(env, "WORKER_SHUTDOWN_TIMEOUT_MS", 15_000, 1);

  return {
    depositIntervalMs,
    depositBatchSize,
    sweepIntervalMs,
    reservationTimeoutMs,
    reconciliationIntervalMs,
    reconciliationRepair,
    shutdownTimeoutMs,
  };
}
