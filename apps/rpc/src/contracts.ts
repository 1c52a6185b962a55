import { z } from "zod";

export const JsonRpcVersionSchema = z.literal("2.0");
export const RpcIdSchema = z.union([z.string(), z.number(), z.null()]);
export type RpcId = z.infer<typeof RpcIdSchema>;

export const RpcRequestSchema = z.object({
  jsonrpc: JsonRpcVersionSchema,
  id: RpcIdSchema,
  method: z.string().min(1),
  params: z.unknown().optional(),
});
export type RpcRequest = z.infer<typeof RpcRequestSchema>;

const AccountIdSchema = z.string().trim().min(1).max(128);
const DecimalAmountSchema = z.string().trim().regex(/^\d+(\.\d+)?$/, "expected a decimal amount");

export const BalanceGetParamsSchema = z.object({
  accountId: AccountIdSchema,
});

export const BalanceGetResultSchema = z.object({
  accountId: z.string().min(1),
  balance: z.string().min(1),
  status: z.enum(["active", "suspended"]),
});

export const DepositClaimParamsSchema = z
  .object({
    accountId: AccountIdSchema,
    txHash: z.string().trim().min(1).max(128),
    expectedAmount: DecimalAmountSchema.optional(),
    packageId: z.string().trim().min(1).optional(),
  })
  .refine((value) => (value.expectedAmount === undefined) !== (value.packageId === undefined), {
    message: "exactly one of expectedAmount or packageId is required",
  });

export const DepositStatusParamsSchema = z.object({
  txHash: z.string().trim().min(1).max(128),
});

export const DepositClaimViewSchema = z.object({
  txHash: z.string().min(1),
  accountId: z.string().min(1),
  expectedAmount: z.string().min(1),
  actualAmount: z.string().nullable(),
  packageId: z.string().nullable(),
  status: z.enum(["pending", "verified", "credited", "rejected"]),
  rejectionReason: z.string().nullable(),
  guidance: z.string().nullable(),
  createdAt: z.string().datetime(),
  creditedAt: z.string().datetime().nullable(),
});

export const PackageQuoteSchema = z.object({
  packageId: z.string().min(1),
  name: z.string().min(1),
  unitCount: z.number().int().min(1),
  cost: z.string().min(1),
  catalogVersion: z.number().int().min(1),
});

export const DepositClaimResultSchema = z.object({
  created: z.boolean(),
  claim: DepositClaimViewSchema,
  quote: PackageQuoteSchema.nullable(),
});

export const VoucherRedeemParamsSchema = z.object({
  accountId: AccountIdSchema,
  code: z.string().min(1).max(64),
});

export const VoucherRedeemResultSchema = z.object({
  code: z.string().min(1),
  value: z.string().min(1),
  balance: z.string().min(1),
});

export const ConversionRequestParamsSchema = z.object({
  accountId: AccountIdSchema,
  requestId: z.string().trim().min(1).max(128),
  installationId: z.string().min(1).max(200),
  packageId: z.string().trim().min(1).optional(),
});

export const ConversionStatusParamsSchema = z.object({
  requestId: z.string().trim().min(1).max(128),
});

export const ConversionResultSchema = z.object({
  requestId: z.string().min(1),
  status: z.enum(["reserved", "finalized", "released"]),
  packageId: z.string().min(1),
  amount: z.string().min(1),
  confirmationId: z.string().nullable(),
  releaseReason: z.string().nullable(),
});

export const PricingListResultSchema = z.object({
  catalogVersion: z.number().int().min(0),
  packages: z.array(PackageQuoteSchema.omit({ catalogVersion: true })),
});

export const RpcErrorCode = {
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,
  UNAUTHORIZED: -32001,
  RATE_LIMITED: -32029,
  INSUFFICIENT_FUNDS: -32010,
  ACCOUNT_SUSPENDED: -32011,
  INVALID_VOUCHER: -32012,
  DEPOSIT_CLAIM_NOT_FOUND: -32013,
  DEPOSIT_CLAIM_CONFLICT: -32014,
  BELOW_MINIMUM_DEPOSIT: -32015,
  UNKNOWN_PACKAGE: -32016,
  INVALID_INSTALLATION_ID: -32017,
  CONVERSION_NOT_FOUND: -32018,
  CONVERSION_REQUEST_CONFLICT: -32019,
} as const;

export type RpcErrorCode = (typeof RpcErrorCode)[keyof typeof RpcErrorCode];
