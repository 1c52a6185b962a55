export { ChainLookupError } from "./chain-client";
export { createChainAdapterProvider, isProductionLikeEnvironment, type ChainAdapterMode } from "./provider";
export { createChainSimulationAdapter, type CreateChainSimulationAdapterArgs } from "./simulation-adapter";
export {
  DEFAULT_CHAIN_SIMULATION_SCENARIO_NAME,
  listChainSimulationScenarioNames,
  resolveChainSimulationScenario,
  type ChainSimulationScenario,
  type ChainSimulationScenarioName,
} from "./simulation-scenarios";
export { USDT_TRC20_CONTRACT, USDT_TRC20_DECIMALS, createTronscanAdapter } from "./tronscan-adapter";
export type {
  ChainAdapter,
  ChainTokenTransfer,
  ChainTransaction,
  CreateTronscanAdapterArgs,
  LookupTransactionArgs,
} from "./types";
