import { createHash } from "node:crypto";
import { ConversionProviderUnavailableError } from "./conversion-client";
import { InvalidInstallationIdError, normalizeInstallationId } from "./installation-id";
import type { ConversionProvider } from "./types";

export type ConversionSimulationScenario = "success" | "unavailable" | "timeout" | "rejected";

const SCENARIOS: readonly ConversionSimulationScenario[] = ["success", "unavailable", "timeout", "rejected"];

export type CreateConversionSimulationAdapterArgs = {
  scenario?: string;
  seed?: string;
  env?: NodeJS.ProcessEnv;
};

function isScenario(value: string): value is ConversionSimulationScenario {
  return SCENARIOS.some((item) => item === value);
}

function resolveScenario(raw: string | undefined): ConversionSimulationScenario {
  const candidate = raw?.trim() || "success";
  if (!isScenario(candidate)) {
    throw new Error(`Unknown conversion simulation scenario '${candidate}'. Supported scenarios: ${SCENARIOS.join(", ")}`);
  }
  return candidate;
}

// Eight groups of six digits, the shape of a real confirmation id.
function makeConfirmationId(seed: string, digits: string): string {
  const hex = createHash("sha256").update(`${seed}|confirmation|${digits}`).digest("hex");
  const decimal = [...hex.slice(0, 48)].map((char) => String(parseInt(char, 16) % 10)).join("");
  return decimal.match(/\d{6}/g)?.join("-") ?? decimal;
}

export function createConversionSimulationAdapter(args: CreateConversionSimulationAdapterArgs = {}): ConversionProvider {
  const env = args.env ?? process.env;
  const scenario = resolveScenario(args.scenario ?? env.CONVERSION_SIMULATION_SCENARIO);
  const seed = args.seed?.trim() || env.CONVERSION_SIMULATION_SEED?.trim() || "cid-ledger-conversion-simulation-seed";

  return {
    async convert({ installationId }) {
      const digits = normalizeInstallationId(installationId);
      if (scenario === "unavailable") {
        throw new ConversionProviderUnavailableError("simulated conversion provider outage", "unavailable", 503);
      }
      if (scenario === "timeout") {
        throw new ConversionProviderUnavailableError("simulated conversion provider timeout", "timeout");
      }
      if (scenario === "rejected") {
        throw new InvalidInstallationIdError("rejected_by_provider", "simulated provider rejection");
      }
      return { confirmationId: makeConfirmationId(seed, digits) };
    },
  };
}
