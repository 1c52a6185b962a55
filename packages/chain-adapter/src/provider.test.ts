import { afterEach, describe, expect, it } from "vitest";
import { createChainAdapterProvider } from "./provider";
import { createChainSimulationAdapter } from "./simulation-adapter";
import { USDT_TRC20_CONTRACT } from "./tronscan-adapter";

const ENV_KEYS = [
  "CHAIN_ADAPTER_MODE",
  "CHAIN_API_URL",
  "CHAIN_API_TIMEOUT_MS",
  "CHAIN_SIMULATION_SCENARIO",
  "CHAIN_SIMULATION_SEED",
  "CHAIN_SIMULATION_AMOUNT",
  "CHAIN_SIMULATION_ALLOW_IN_PRODUCTION",
  "DEPOSIT_ADDRESS",
  "NODE_ENV",
  "APP_ENV",
  "ENVIRONMENT",
] as const;

const previousEnv: Partial<Record<(typeof ENV_KEYS)[number], string | undefined>> = {};

for (const key of ENV_KEYS) {
  previousEnv[key] = process.env[key];
}

afterEach(() => {
  for (const key of ENV_KEYS) {
    const previous = previousEnv[key];
    if (previous === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = previous;
    }
  }
});

describe("chain simulation adapter", () => {
  it("confirms after one poll for the confirmed-after-1-poll scenario", async () => {
    const adapter = createChainSimulationAdapter({
      scenario: "confirmed-after-1-poll",
      depositAddress: "TDeposit",
      amount: "12.5",
      env: {},
    });

    const first = await adapter.lookupTransaction({ txHash: "tx-1" });
    const second = await adapter.lookupTransaction({ txHash: "tx-1" });

    expect(first).toMatchObject({ found: true, confirmed: false, confirmations: 0 });
    expect(second).toMatchObject({ found: true, confirmed: true, confirmations: 20 });
    expect(second.found && second.transfers).toEqual([
      expect.objectContaining({ tokenContract: USDT_TRC20_CONTRACT, toAddress: "TDeposit", amount: "12.5" }),
    ]);
  });

  it("derives identical sender addresses from the same seed", async () => {
    const first = createChainSimulationAdapter({ seed: "seed-det", env: {} });
    const second = createChainSimulationAdapter({ seed: "seed-det", env: {} });

    const a = await first.lookupTransaction({ txHash: "tx-9" });
    const b = await second.lookupTransaction({ txHash: "tx-9" });

    expect(a.found && a.transfers[0]?.fromAddress).toBe(b.found && b.transfers[0]?.fromAddress);
    expect(a.found && a.transfers[0]?.fromAddress).toMatch(/^T[0-9a-f]{33}$/);
  });

  it("rejects unknown scenarios", () => {
    expect(() => createChainSimulationAdapter({ scenario: "sometimes", env: {} })).toThrow(
      "Unknown chain simulation scenario 'sometimes'.",
    );
  });
});

describe("chain adapter provider", () => {
  it("requires the chain API url in tronscan mode", () => {
    delete process.env.CHAIN_ADAPTER_MODE;
    delete process.env.CHAIN_API_URL;

    expect(() => createChainAdapterProvider()).toThrow("CHAIN_API_URL environment variable is not set.");
  });

  it("rejects unknown modes", () => {
    expect(() => createChainAdapterProvider({ mode: "etherscan" })).toThrow(
      "Invalid CHAIN_ADAPTER_MODE 'etherscan'. Expected one of: tronscan, simulation.",
    );
  });

  it("passes environment settings to the tronscan factory", () => {
    process.env.CHAIN_API_URL = "https://chain.example.test/api";
    process.env.CHAIN_API_TIMEOUT_MS = "2500";
    const received: unknown[] = [];

    createChainAdapterProvider({
      tronscanFactory: (args) => {
        received.push(args);
        return { lookupTransaction: async ({ txHash }) => ({ found: false, txHash }) };
      },
    });

    expect(received[0]).toMatchObject({ endpoint: "https://chain.example.test/api", timeoutMs: 2500 });
  });

  it("selects simulation mode from the environment", async () => {
    process.env.CHAIN_ADAPTER_MODE = "simulation";
    process.env.CHAIN_SIMULATION_SCENARIO = "not-found";

    const adapter = createChainAdapterProvider();

    await expect(adapter.lookupTransaction({ txHash: "abc" })).resolves.toEqual({ found: false, txHash: "abc" });
  });

  it("blocks simulation mode in production-like environments by default", () => {
    process.env.CHAIN_ADAPTER_MODE = "simulation";
    process.env.APP_ENV = "prod";
    delete process.env.CHAIN_SIMULATION_ALLOW_IN_PRODUCTION;

    expect(() => createChainAdapterProvider()).toThrow(
      "Chain simulation adapter is blocked in production-like environments.",
    );
  });

  it("allows simulation in production when explicitly overridden", async () => {
    process.env.CHAIN_ADAPTER_MODE = "simulation";
    process.env.NODE_ENV = "production";
    process.env.CHAIN_SIMULATION_ALLOW_IN_PRODUCTION = "true";

    const adapter = createChainAdapterProvider({ simulation: { scenario: "provider-error" } });

    await expect(adapter.lookupTransaction({ txHash: "abc" })).rejects.toThrow(
      "simulated chain API outage (scenario=provider-error)",
    );
  });
});
