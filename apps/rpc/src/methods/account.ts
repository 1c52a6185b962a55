import type { TransactionCoordinator } from "@cid-ledger/ledger-core";

export type HandleBalanceGetInput = {
  accountId: string;
};

type HandleBalanceGetOptions = {
  coordinator: Pick<TransactionCoordinator, "getBalance">;
};

export async function handleBalanceGet(input: HandleBalanceGetInput, options: HandleBalanceGetOptions) {
  return options.coordinator.getBalance(input.accountId);
}
