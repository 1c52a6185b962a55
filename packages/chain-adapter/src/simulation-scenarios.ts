export type ChainSimulationScenarioName =
  | "confirmed-immediately"
  | "confirmed-after-1-poll"
  | "underpaid"
  | "wrong-destination"
  | "not-found"
  | "provider-error";

export type ChainSimulationLifecycle =
  | { kind: "confirmed" }
  | { kind: "confirm-after-polls"; confirmAfterPolls: number }
  | { kind: "not-found" }
  | { kind: "error"; message: string };

export type ChainSimulationTransfer = { kind: "configured-amount" } | { kind: "fixed-amount"; amount: string };

export type ChainSimulationScenario = {
  name: ChainSimulationScenarioName;
  description: string;
  lifecycle: ChainSimulationLifecycle;
  transfer: ChainSimulationTransfer;
  destination: "deposit-address" | "elsewhere";
};

const SCENARIOS: Record<ChainSimulationScenarioName, Omit<ChainSimulationScenario, "name">> = {
  "confirmed-immediately": {
    description: "Every lookup returns a confirmed transfer of the configured amount to the deposit address.",
    lifecycle: { kind: "confirmed" },
    transfer: { kind: "configured-amount" },
    destination: "deposit-address",
  },
  "confirmed-after-1-poll": {
    description: "First lookup has zero confirmations, second and later lookups are confirmed.",
    lifecycle: { kind: "confirm-after-polls", confirmAfterPolls: 1 },
    transfer: { kind: "configured-amount" },
    destination: "deposit-address",
  },
  underpaid: {
    description: "Confirmed transfer of 5.5 tokens regardless of the configured amount.",
    lifecycle: { kind: "confirmed" },
    transfer: { kind: "fixed-amount", amount: "5.5" },
    destination: "deposit-address",
  },
  "wrong-destination": {
    description: "Confirmed transfer that pays an address other than the deposit address.",
    lifecycle: { kind: "confirmed" },
    transfer: { kind: "configured-amount" },
    destination: "elsewhere",
  },
  "not-found": {
    description: "No transaction exists for any hash.",
    lifecycle: { kind: "not-found" },
    transfer: { kind: "configured-amount" },
    destination: "deposit-address",
  },
  "provider-error": {
    description: "Every lookup fails as if the chain API were unavailable.",
    lifecycle: { kind: "error", message: "simulated chain API outage" },
    transfer: { kind: "configured-amount" },
    destination: "deposit-address",
  },
};

export const DEFAULT_CHAIN_SIMULATION_SCENARIO_NAME: ChainSimulationScenarioName = "confirmed-immediately";

export function listChainSimulationScenarioNames(): ChainSimulationScenarioName[] {
  return Object.keys(SCENARIOS).filter(isChainSimulationScenarioName);
}

function isChainSimulationScenarioName(value: string): value is ChainSimulationScenarioName {
  return value in SCENARIOS;
}

export function resolveChainSimulationScenario(name: string | undefined): ChainSimulationScenario {
  const candidate = name?.trim() || DEFAULT_CHAIN_SIMULATION_SCENARIO_NAME;
  if (!isChainSimulationScenarioName(candidate)) {
    throw new Error(
      `Unknown chain simulation scenario '${candidate}'. Supported scenarios: ${listChainSimulationScenarioNames().join(", ")}`,
    );
  }
  const resolved = SCENARIOS[candidate];
  return {
    name: candidate,
    description: resolved.description,
    lifecycle: { ...resolved.lifecycle },
    transfer: { ...resolved.transfer },
    destination: resolved.destination,
  };
}
