import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import { Pool } from "pg";
import * as schema from "./schema";

export type DbClient = NodePgDatabase<typeof schema>;

export type DbPoolOptions = {
  maxConnections: number;
  statementTimeoutMs: number;
};

function readPositiveInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new Error(`Invalid ${name}: expected integer >= 1`);
  }
  return value;
}

export function parseDbPoolOptions(env: NodeJS.ProcessEnv = process.env): DbPoolOptions {
  return {
    maxConnections: readPositiveInt(env, "DATABASE_POOL_MAX", 10),
    statementTimeoutMs: readPositiveInt(env, "DATABASE_STATEMENT_TIMEOUT_MS", 10_000),
  };
}

export function createDbClient(url = process.env.DATABASE_URL, options: DbPoolOptions = parseDbPoolOptions()): DbClient {
  if (!url) {
    throw new Error("DATABASE_URL is required");
  }

  // Balance writes hold row locks; a stuck statement must not pin an account forever.
  const pool = new Pool({
    connectionString: url,
    max: options.maxConnections,
    statement_timeout: options.statementTimeoutMs,
    application_name: "cid-ledger",
  });

  return drizzle(pool, { schema });
}

export function isUniqueViolation(err: unknown): boolean {
  // postgres unique violation
  return typeof err === "object" && err !== null && "code" in err && err.code === "23505";
}
