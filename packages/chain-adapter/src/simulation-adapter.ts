import { createHash } from "node:crypto";
import { ChainLookupError } from "./chain-client";
import { resolveChainSimulationScenario } from "./simulation-scenarios";
import { USDT_TRC20_CONTRACT } from "./tronscan-adapter";
import type { ChainAdapter, ChainTransaction } from "./types";

export type CreateChainSimulationAdapterArgs = {
  scenario?: string;
  seed?: string;
  depositAddress?: string;
  amount?: string;
  confirmations?: number;
  env?: NodeJS.ProcessEnv;
};

const SIMULATED_CONFIRMATIONS = 20;
const SIMULATED_TIP_BLOCK = 60_000_000;

function stableHex(input: string, length: number): string {
  return createHash("sha256").update(input).digest("hex").slice(0, length);
}

function resolveSeed(seed: string | undefined): string {
  const trimmed = seed?.trim();
  return trimmed || "cid-ledger-chain-simulation-seed";
}

export function createChainSimulationAdapter(args: CreateChainSimulationAdapterArgs = {}): ChainAdapter {
  const env = args.env ?? process.env;
  const scenario = resolveChainSimulationScenario(args.scenario ?? env.CHAIN_SIMULATION_SCENARIO);
  const seed = resolveSeed(args.seed ?? env.CHAIN_SIMULATION_SEED);
  const depositAddress = (args.depositAddress ?? env.DEPOSIT_ADDRESS ?? "").trim() || "TSimulatedDepositAddress";
  const configuredAmount = (args.amount ?? env.CHAIN_SIMULATION_AMOUNT ?? "").trim() || "50";
  const confirmedDepth = args.confirmations ?? SIMULATED_CONFIRMATIONS;
  const pollCounts = new Map<string, number>();

  return {
    async lookupTransaction({ txHash }): Promise<ChainTransaction> {
      const polls = (pollCounts.get(txHash) ?? 0) + 1;
      pollCounts.set(txHash, polls);

      const lifecycle = scenario.lifecycle;
      if (lifecycle.kind === "error") {
        throw new ChainLookupError(`${lifecycle.message} (scenario=${scenario.name})`, 503);
      }
      if (lifecycle.kind === "not-found") {
        return { found: false, txHash };
      }

      const confirmations =
        lifecycle.kind === "confirm-after-polls" && polls <= lifecycle.confirmAfterPolls ? 0 : confirmedDepth;
      const toAddress =
        scenario.destination === "deposit-address" ? depositAddress : `T${stableHex(`${seed}|elsewhere|${txHash}`, 33)}`;

      return {
        found: true,
        txHash,
        confirmed: confirmations > 0,
        blockNumber: SIMULATED_TIP_BLOCK - confirmations,
        confirmations,
        transfers: [
          {
            tokenContract: USDT_TRC20_CONTRACT,
            fromAddress: `T${stableHex(`${seed}|sender|${txHash}`, 33)}`,
            toAddress,
            amount: scenario.transfer.kind === "fixed-amount" ? scenario.transfer.amount : configuredAmount,
          },
        ],
      };
    },
  };
}
