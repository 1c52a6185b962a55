import { createChainSimulationAdapter, type CreateChainSimulationAdapterArgs } from "./simulation-adapter";
import { createTronscanAdapter } from "./tronscan-adapter";
import type { ChainAdapter, CreateTronscanAdapterArgs } from "./types";

export type ChainAdapterMode = "tronscan" | "simulation";

export type CreateChainAdapterProviderArgs = {
  mode?: ChainAdapterMode | string;
  endpoint?: string;
  tokenContract?: string;
  apiKey?: string;
  timeoutMs?: number;
  fetchFn?: typeof fetch;
  simulation?: CreateChainSimulationAdapterArgs;
  tronscanFactory?: (args: CreateTronscanAdapterArgs) => ChainAdapter;
  env?: NodeJS.ProcessEnv;
};

function parseBoolean(value: string | undefined): boolean {
  if (!value) {
    return false;
  }
  const normalized = value.trim().toLowerCase();
  return normalized === "1" || normalized === "true" || normalized === "yes" || normalized === "on";
}

function parseMode(raw: string | undefined): ChainAdapterMode {
  const normalized = (raw ?? "tronscan").trim().toLowerCase();
  if (normalized === "tronscan") {
    return "tronscan";
  }
  if (normalized === "simulation") {
    return "simulation";
  }

  throw new Error(`Invalid CHAIN_ADAPTER_MODE '${raw}'. Expected one of: tronscan, simulation.`);
}

function parseTimeout(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === "") {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new Error("Invalid CHAIN_API_TIMEOUT_MS: expected integer >= 1");
  }
  return value;
}

export function isProductionLikeEnvironment(env: NodeJS.ProcessEnv): boolean {
  const candidates = [env.NODE_ENV, env.APP_ENV, env.ENVIRONMENT];
  return candidates.some((value) => {
    const normalized = (value ?? "").trim().toLowerCase();
    return normalized === "production" || normalized === "prod";
  });
}

function assertSimulationGuardrails(env: NodeJS.ProcessEnv) {
  if (!isProductionLikeEnvironment(env)) {
    return;
  }

  if (parseBoolean(env.CHAIN_SIMULATION_ALLOW_IN_PRODUCTION)) {
    return;
  }

  throw new Error(
    "Chain simulation adapter is blocked in production-like environments. Set CHAIN_SIMULATION_ALLOW_IN_PRODUCTION=true to override intentionally.",
  );
}

export function createChainAdapterProvider(args: CreateChainAdapterProviderArgs = {}): ChainAdapter {
  const env = args.env ?? process.env;
  const mode = parseMode(args.mode ?? env.CHAIN_ADAPTER_MODE);

  if (mode === "simulation") {
    assertSimulationGuardrails(env);
    return createChainSimulationAdapter({
      ...args.simulation,
      env,
    });
  }

  const endpoint = (args.endpoint ?? env.CHAIN_API_URL ?? "").trim();
  if (!endpoint) {
    throw new Error("CHAIN_API_URL environment variable is not set.");
  }

  const tronscanFactory = args.tronscanFactory ?? createTronscanAdapter;
  return tronscanFactory({
    endpoint,
    tokenContract: args.tokenContract ?? env.DEPOSIT_TOKEN_CONTRACT,
    apiKey: args.apiKey ?? env.CHAIN_API_KEY,
    timeoutMs: args.timeoutMs ?? parseTimeout(env.CHAIN_API_TIMEOUT_MS),
    fetchFn: args.fetchFn,
  });
}
