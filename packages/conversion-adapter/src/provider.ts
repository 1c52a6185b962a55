import { createHttpConversionAdapter } from "./http-adapter";
import { createConversionSimulationAdapter, type CreateConversionSimulationAdapterArgs } from "./simulation-adapter";
import type { ConversionProvider, CreateHttpConversionAdapterArgs } from "./types";

export type ConversionAdapterMode = "http" | "simulation";

export type CreateConversionProviderArgs = {
  mode?: ConversionAdapterMode | string;
  endpoint?: string;
  apiKey?: string;
  timeoutMs?: number;
  fetchFn?: typeof fetch;
  simulation?: CreateConversionSimulationAdapterArgs;
  httpFactory?: (args: CreateHttpConversionAdapterArgs) => ConversionProvider;
  env?: NodeJS.ProcessEnv;
};

function parseBoolean(value: string | undefined): boolean {
  if (!value) {
    return false;
  }
  const normalized = value.trim().toLowerCase();
  return normalized === "1" || normalized === "true" || normalized === "yes" || normalized === "on";
}

function parseMode(raw: string | undefined): ConversionAdapterMode {
  const normalized = (raw ?? "http").trim().toLowerCase();
  if (normalized === "http") {
    return "http";
  }
  if (normalized === "simulation") {
    return "simulation";
  }

  throw new Error(`Invalid CONVERSION_ADAPTER_MODE '${raw}'. Expected one of: http, simulation.`);
}

function parseTimeout(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === "") {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new Error("Invalid CONVERSION_TIMEOUT_MS: expected integer >= 1");
  }
  return value;
}

function isProductionLikeEnvironment(env: NodeJS.ProcessEnv): boolean {
  const candidates = [env.NODE_ENV, env.APP_ENV, env.ENVIRONMENT];
  return candidates.some((value) => {
    const normalized = (value ?? "").trim().toLowerCase();
    return normalized === "production" || normalized === "prod";
  });
}

function assertSimulationGuardrails(env: NodeJS.ProcessEnv) {
  if (!isProductionLikeEnvironment(env) || parseBoolean(env.CONVERSION_SIMULATION_ALLOW_IN_PRODUCTION)) {
    return;
  }

  throw new Error(
    "Conversion simulation adapter is blocked in production-like environments. Set CONVERSION_SIMULATION_ALLOW_IN_PRODUCTION=true to override intentionally.",
  );
}

export function createConversionProvider(args: CreateConversionProviderArgs = {}): ConversionProvider {
  const env = args.env ?? process.env;
  const mode = parseMode(args.mode ?? env.CONVERSION_ADAPTER_MODE);

  if (mode === "simulation") {
    assertSimulationGuardrails(env);
    return createConversionSimulationAdapter({
      ...args.simulation,
      env,
    });
  }

  const endpoint = (args.endpoint ?? env.CONVERSION_API_URL ?? "").trim();
  if (!endpoint) {
    throw new Error("CONVERSION_API_URL environment variable is not set.");
  }
  const apiKey = (args.apiKey ?? env.CONVERSION_API_KEY ?? "").trim();
  if (!apiKey) {
    throw new Error("CONVERSION_API_KEY environment variable is not set.");
  }

  const httpFactory = args.httpFactory ?? createHttpConversionAdapter;
  return httpFactory({
    endpoint,
    apiKey,
    timeoutMs: args.timeoutMs ?? parseTimeout(env.CONVERSION_TIMEOUT_MS),
    fetchFn: args.fetchFn,
  });
}
