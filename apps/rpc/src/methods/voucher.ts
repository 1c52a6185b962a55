import type { TransactionCoordinator } from "@cid-ledger/ledger-core";

export type HandleVoucherRedeemInput = {
  accountId: string;
  code: string;
};

type HandleVoucherRedeemOptions = {
  coordinator: Pick<TransactionCoordinator, "redeemVoucher">;
};

export async function handleVoucherRedeem(input: HandleVoucherRedeemInput, options: HandleVoucherRedeemOptions) {
  const { voucher, ledger } = await options.coordinator.redeemVoucher(input);
  return {
    code: voucher.code,
    value: voucher.value,
    balance: ledger.account.balance,
  };
}
