import Redis from "ioredis";
import { createDbClient } from "@cid-ledger/db";
import { createLedgerServices, ensureDefaultPricing } from "@cid-ledger/ledger-core";
import { createNonceStore } from "./nonce-store";
import { createRateLimitStore, parseRpcRateLimitConfig } from "./rate-limit";
import { loadSecretMap } from "./secret-map";
import { buildServer } from "./server";

const host = process.env.RPC_HOST ?? "0.0.0.0";
const port = Number(process.env.RPC_PORT ?? "3000");

if (!Number.isInteger(port) || port <= 0 || port > 65535) {
  throw new Error(`Invalid RPC_PORT: ${process.env.RPC_PORT ?? ""}`);
}

async function main() {
  const databaseUrl = process.env.DATABASE_URL?.trim();
  const redisUrl = process.env.REDIS_URL?.trim();
  const services = createLedgerServices({ env: process.env, db: databaseUrl ? createDbClient(databaseUrl) : null });
  await ensureDefaultPricing(services.pricingCatalogRepo, { now: new Date() });

  const redis = redisUrl ? new Redis(redisUrl) : null;
  const nonceStore = createNonceStore(redis);
  const rateLimitStore = createRateLimitStore(redis);
  const app = buildServer({
    coordinator: services.coordinator,
    ledgerRepo: services.ledgerRepo,
    nonceStore,
    rateLimitStore,
    rateLimit: parseRpcRateLimitConfig(process.env),
    secretMap: loadSecretMap(process.env),
    fallbackSecret: process.env.CID_LEDGER_HMAC_SECRET ?? "",
  });
  if (!databaseUrl) {
    app.log.warn("DATABASE_URL is not set; balances live in memory for this process only");
  }

  const shutdown = async () => {
    try {
      await app.close();
      await nonceStore.close();
      await rateLimitStore.close();
      await redis?.quit();
    } finally {
      process.exit(0);
    }
  };

  process.once("SIGINT", () => {
    void shutdown();
  });
  process.once("SIGTERM", () => {
    void shutdown();
  });

  await app.listen({ host, port });
  app.log.info({ host, port }, "RPC server started");
}

void main().catch((error) => {
  console.error("RPC server failed to start", error);
  process.exit(1);
});
