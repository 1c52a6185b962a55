import { createChainAdapterProvider, type ChainAdapter } from "@cid-ledger/chain-adapter";
import { createConversionProvider, type ConversionProvider } from "@cid-ledger/conversion-adapter";
import {
  createDbConversionDebitRepo,
  createDbDepositClaimRepo,
  createDbLedgerRepo,
  createDbPricingCatalogRepo,
  createDbVoucherRepo,
  createInMemoryConversionDebitRepo,
  createInMemoryDepositClaimRepo,
  createInMemoryLedgerRepo,
  createInMemoryPricingCatalogRepo,
  createInMemoryVoucherRepo,
  type ConversionDebitRepo,
  type DbClient,
  type DepositClaimRepo,
  type LedgerRepo,
  type PricingCatalogRepo,
  type PricingSnapshot,
  type VoucherRepo,
} from "@cid-ledger/db";
import { parseLedgerConfig, type LedgerConfig } from "./config";
import { createTransactionCoordinator, type TransactionCoordinator } from "./coordinator";
import { createDepositVerifier, type DepositVerifier } from "./deposit-verifier";
import { createComponentLogger, type ComponentLogger } from "./logger";
import { DEFAULT_PRICING_PACKAGES } from "./pricing";

export type LedgerRepos = {
  ledgerRepo: LedgerRepo;
  depositClaimRepo: DepositClaimRepo;
  voucherRepo: VoucherRepo;
  conversionDebitRepo: ConversionDebitRepo;
  pricingCatalogRepo: PricingCatalogRepo;
};

export type LedgerServices = LedgerRepos & {
  config: LedgerConfig;
  verifier: DepositVerifier;
  coordinator: TransactionCoordinator;
};

export type CreateLedgerServicesArgs = {
  env?: NodeJS.ProcessEnv;
  db?: DbClient | null;
  repos?: LedgerRepos;
  chainAdapter?: ChainAdapter;
  conversionProvider?: ConversionProvider;
  logger?: ComponentLogger;
  nowFn?: () => Date;
};

export function createDbLedgerRepos(db: DbClient): LedgerRepos {
  return {
    ledgerRepo: createDbLedgerRepo(db),
    depositClaimRepo: createDbDepositClaimRepo(db),
    voucherRepo: createDbVoucherRepo(db),
    conversionDebitRepo: createDbConversionDebitRepo(db),
    pricingCatalogRepo: createDbPricingCatalogRepo(db),
  };
}

export function createInMemoryLedgerRepos(): LedgerRepos {
  const ledgerRepo = createInMemoryLedgerRepo();
  return {
    ledgerRepo,
    depositClaimRepo: createInMemoryDepositClaimRepo({ ledgerRepo }),
    voucherRepo: createInMemoryVoucherRepo(),
    conversionDebitRepo: createInMemoryConversionDebitRepo({ ledgerRepo }),
    pricingCatalogRepo: createInMemoryPricingCatalogRepo(DEFAULT_PRICING_PACKAGES),
  };
}

export function createLedgerServices(args: CreateLedgerServicesArgs = {}): LedgerServices {
  const env = args.env ?? process.env;
  const config = parseLedgerConfig(env);
  const repos = args.repos ?? (args.db ? createDbLedgerRepos(args.db) : createInMemoryLedgerRepos());
  const logger = args.logger ?? createComponentLogger("coordinator");

  const verifier = createDepositVerifier({
    chainAdapter: args.chainAdapter ?? createChainAdapterProvider({ env }),
    requiredConfirmations: config.requiredConfirmations,
    amountTolerance: config.amountTolerance,
    retryPolicy: config.verifyRetry,
    logger,
  });
  const coordinator = createTransactionCoordinator({
    ...repos,
    verifier,
    conversionProvider: args.conversionProvider ?? createConversionProvider({ env }),
    config,
    nowFn: args.nowFn,
    logger,
  });

  return { ...repos, config, verifier, coordinator };
}

/** Stores the default catalog when none exists yet; an existing catalog is left alone. */
export async function ensureDefaultPricing(
  repo: PricingCatalogRepo,
  params: { now: Date; logger?: ComponentLogger },
): Promise<PricingSnapshot> {
  const current = await repo.loadSnapshot();
  if (current.version > 0) {
    return current;
  }
  const seeded = await repo.replaceAll(DEFAULT_PRICING_PACKAGES, { now: params.now, createdBy: "system" });
  params.logger?.info("pricing.seeded", { version: seeded.version, packages: seeded.packages.length });
  return seeded;
}
