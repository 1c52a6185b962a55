import { fromBaseUnits } from "@cid-ledger/db";
import { ChainLookupError, chainGet, isRecord } from "./chain-client";
import type { ChainAdapter, ChainTokenTransfer, ChainTransaction, CreateTronscanAdapterArgs } from "./types";

export const USDT_TRC20_CONTRACT = "TR7NHqjeKQxGTCi8q8ZY4pL8otSzgjLj6t";
export const USDT_TRC20_DECIMALS = 6;
const DEFAULT_TIMEOUT_MS = 10_000;
const MAX_TOKEN_DECIMALS = 30;

function readString(value: unknown): string | null {
  return typeof value === "string" && value.trim() ? value.trim() : null;
}

function readInteger(value: unknown): number | null {
  if (typeof value === "number" && Number.isInteger(value)) {
    return value;
  }
  if (typeof value === "string" && /^\d+$/.test(value.trim())) {
    return Number(value.trim());
  }
  return null;
}

function readQuant(value: unknown): string | null {
  if (typeof value === "number") {
    return Number.isSafeInteger(value) && value >= 0 ? String(value) : null;
  }
  const quant = readString(value);
  return quant && /^\d+$/.test(quant) ? quant : null;
}

function pickTransfers(payload: Record<string, unknown>, tokenContract: string, decimals: number): ChainTokenTransfer[] {
  const raw = payload.trc20TransferInfo;
  if (!Array.isArray(raw)) {
    return [];
  }

  const transfers: ChainTokenTransfer[] = [];
  for (const item of raw) {
    if (!isRecord(item) || readString(item.contract_address) !== tokenContract) {
      continue;
    }
    const toAddress = readString(item.to_address);
    if (!toAddress || item.quant === undefined || item.quant === null) {
      throw new ChainLookupError("transaction-info transfer is missing 'to_address' or 'quant'", undefined, item);
    }
    const quant = readQuant(item.quant);
    if (quant === null) {
      throw new ChainLookupError("transaction-info transfer has a malformed 'quant'", undefined, item);
    }
    const itemDecimals = item.decimals === undefined || item.decimals === null ? decimals : readInteger(item.decimals);
    if (itemDecimals === null || itemDecimals < 0 || itemDecimals > MAX_TOKEN_DECIMALS) {
      throw new ChainLookupError("transaction-info transfer has a malformed 'decimals'", undefined, item);
    }
    transfers.push({
      tokenContract,
      fromAddress: readString(item.from_address),
      toAddress,
      amount: fromBaseUnits(quant, itemDecimals),
    });
  }
  return transfers;
}

export function createTronscanAdapter(args: CreateTronscanAdapterArgs): ChainAdapter {
  const endpoint = args.endpoint.replace(/\/+$/, "");
  const tokenContract = args.tokenContract?.trim() || USDT_TRC20_CONTRACT;
  const decimals = args.decimals ?? USDT_TRC20_DECIMALS;
  const requestArgs = {
    fetchFn: args.fetchFn,
    timeoutMs: args.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    headers: args.apiKey ? { "TRON-PRO-API-KEY": args.apiKey } : undefined,
  };

  async function getLatestBlock(): Promise<number> {
    const status = await chainGet(`${endpoint}/system/status`, requestArgs);
    const block = isRecord(status) && isRecord(status.database) ? readInteger(status.database.block) : null;
    if (block === null) {
      throw new ChainLookupError("system/status response is missing 'database.block'", undefined, status);
    }
    return block;
  }

  return {
    async lookupTransaction({ txHash }): Promise<ChainTransaction> {
      const payload = await chainGet(
        `${endpoint}/transaction-info?hash=${encodeURIComponent(txHash)}`,
        requestArgs,
      );
      if (!isRecord(payload) || !readString(payload.hash)) {
        return { found: false, txHash };
      }

      const transfers = pickTransfers(payload, tokenContract, decimals);
      const confirmed = payload.confirmed === true;
      const blockNumber = readInteger(payload.blockNumber);
      let confirmations = 0;
      if (blockNumber !== null) {
        confirmations = Math.max(0, (await getLatestBlock()) - blockNumber);
      }

      return { found: true, txHash, confirmed, blockNumber, confirmations, transfers };
    },
  };
}
