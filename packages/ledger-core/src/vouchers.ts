import { randomInt } from "crypto";
import type { CreateVoucherInput } from "@cid-ledger/db";
import { InvalidVoucherBatchError, InvalidVoucherCodeError } from "./errors";

const CODE_ALPHABET = "ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789";
const MIN_RANDOM_CHARS = 4;
const DAY_MS = 24 * 60 * 60 * 1000;

export const DEFAULT_VOUCHER_PREFIX = "CID";
export const VOUCHER_CODE_LENGTH = 12;
export const MAX_VOUCHER_BATCH = 100;

export type RandomIndexFn = (max: number) => number;

export type VoucherBatchRequest = {
  count: number;
  value: string;
  createdBy: string;
  now: Date;
  prefix?: string;
  customCode?: string;
  expiresInDays?: number | null;
};

export function normalizeVoucherCode(raw: string): string {
  const code = raw.trim().toUpperCase();
  if (!/^[A-Z0-9]{6,20}$/.test(code)) {
    throw new InvalidVoucherCodeError("voucher code must be 6-20 letters or digits");
  }
  return code;
}

export function normalizeVoucherPrefix(raw: string): string {
  const prefix = raw.trim().toUpperCase();
  if (!/^[A-Z0-9]{1,8}$/.test(prefix)) {
    throw new InvalidVoucherCodeError("voucher prefix must be 1-8 letters or digits");
  }
  return prefix;
}

export function generateVoucherCode(
  options: { prefix?: string; length?: number; randomIndex?: RandomIndexFn } = {},
): string {
  const prefix = normalizeVoucherPrefix(options.prefix ?? DEFAULT_VOUCHER_PREFIX);
  const length = options.length ?? VOUCHER_CODE_LENGTH;
  const randomIndex = options.randomIndex ?? randomInt;
  if (length - prefix.length < MIN_RANDOM_CHARS) {
    throw new InvalidVoucherCodeError(`voucher prefix ${prefix} leaves fewer than ${MIN_RANDOM_CHARS} random characters`);
  }

  let code = prefix;
  while (code.length < length) {
    code += CODE_ALPHABET[randomIndex(CODE_ALPHABET.length)];
  }
  return code;
}

export function buildVoucherBatch(request: VoucherBatchRequest, randomIndex?: RandomIndexFn): CreateVoucherInput[] {
  if (!Number.isInteger(request.count) || request.count < 1 || request.count > MAX_VOUCHER_BATCH) {
    throw new InvalidVoucherBatchError(`voucher count must be between 1 and ${MAX_VOUCHER_BATCH}`);
  }
  if (request.customCode !== undefined && request.count !== 1) {
    throw new InvalidVoucherBatchError("a custom voucher code can only be used for a single voucher");
  }

  let expiresAt: Date | null = null;
  if (request.expiresInDays !== undefined && request.expiresInDays !== null) {
    if (!Number.isInteger(request.expiresInDays) || request.expiresInDays < 1) {
      throw new InvalidVoucherBatchError("voucher expiry must be a whole number of days >= 1");
    }
    expiresAt = new Date(request.now.getTime() + request.expiresInDays * DAY_MS);
  }

  const codes = new Set<string>();
  if (request.customCode !== undefined) {
    codes.add(normalizeVoucherCode(request.customCode));
  }
  while (codes.size < request.count) {
    codes.add(generateVoucherCode({ prefix: request.prefix, randomIndex }));
  }

  return [...codes].map((code) => ({
    code,
    value: request.value,
    createdBy: request.createdBy,
    expiresAt,
  }));
}
