export type ChainTokenTransfer = {
  tokenContract: string;
  fromAddress: string | null;
  toAddress: string;
  amount: string;
};

export type ChainTransaction =
  | { found: false; txHash: string }
  | {
      found: true;
      txHash: string;
      confirmed: boolean;
      blockNumber: number | null;
      confirmations: number;
      transfers: ChainTokenTransfer[];
    };

export type LookupTransactionArgs = { txHash: string };

export type CreateTronscanAdapterArgs = {
  endpoint: string;
  tokenContract?: string;
  decimals?: number;
  apiKey?: string;
  timeoutMs?: number;
  fetchFn?: typeof fetch;
};

export type ChainAdapter = {
  lookupTransaction: (args: LookupTransactionArgs) => Promise<ChainTransaction>;
};
