import type { FastifyInstance, FastifyReply } from "fastify";
import type { z } from "zod";
import type { LedgerRepo } from "@cid-ledger/db";
import type { TransactionCoordinator } from "@cid-ledger/ledger-core";
import { isTimestampFresh, readSignedHeaders, verifyHmac } from "./auth/hmac";
import {
  BalanceGetParamsSchema,
  ConversionRequestParamsSchema,
  ConversionStatusParamsSchema,
  DepositClaimParamsSchema,
  DepositStatusParamsSchema,
  RpcErrorCode,
  RpcRequestSchema,
  VoucherRedeemParamsSchema,
  type RpcId,
} from "./contracts";
import { handleBalanceGet } from "./methods/account";
import { handleConversionRequest, handleConversionStatus } from "./methods/conversion";
import { handleDepositClaim, handleDepositStatus } from "./methods/deposit";
import { handlePricingList } from "./methods/pricing";
import { handleVoucherRedeem } from "./methods/voucher";
import type { NonceStore } from "./nonce-store";
import { rateLimitKey, type RateLimitStore, type RpcRateLimitConfig } from "./rate-limit";
import { RpcMethodError, rpcErrorResponse, rpcResultResponse, toRpcMethodError } from "./rpc-error";
import { resolveSecretForApp, type SecretMap } from "./secret-map";

const NONCE_TTL_MS = 5 * 60 * 1000;

export type RpcCoordinator = Pick<
  TransactionCoordinator,
  | "getBalance"
  | "submitDepositClaim"
  | "getDepositClaim"
  | "redeemVoucher"
  | "requestConversion"
  | "getConversion"
  | "listPackages"
>;

type HealthProbeStatus = {
  status: "ok" | "error";
  message?: string;
};

type ReadinessChecks = {
  storage: HealthProbeStatus;
  nonceStore: HealthProbeStatus;
};

type ReadinessProbeResult = {
  ready: boolean;
  checks: ReadinessChecks;
};

type ReadinessProbeFn = () => Promise<ReadinessProbeResult>;

export type RegisterRpcOptions = {
  coordinator: RpcCoordinator;
  ledgerRepo: Pick<LedgerRepo, "getBalance">;
  nonceStore: NonceStore;
  secretMap?: SecretMap | null;
  fallbackSecret?: string;
  rateLimitStore?: RateLimitStore;
  rateLimit?: RpcRateLimitConfig;
  readinessProbe?: ReadinessProbeFn;
  nowMsFn?: () => number;
};

type MethodHandler = (params: unknown, context: { appId: string }) => Promise<unknown>;

function parseParams<T extends z.ZodTypeAny>(schema: T, params: unknown): z.infer<T> {
  const parsed = schema.safeParse(params ?? {});
  if (!parsed.success) {
    throw new RpcMethodError(RpcErrorCode.INVALID_PARAMS, "Invalid params", parsed.error.issues);
  }
  return parsed.data;
}

function probeMessage(error: unknown) {
  return error instanceof Error ? error.message : String(error);
}

async function runDefaultReadinessProbe(options: RegisterRpcOptions): Promise<ReadinessProbeResult> {
  const checks: ReadinessChecks = {
    storage: { status: "error", message: "not checked" },
    nonceStore: { status: "error", message: "not checked" },
  };

  try {
    await options.ledgerRepo.getBalance("__healthz_probe__");
    checks.storage = { status: "ok" };
  } catch (error) {
    checks.storage = { status: "error", message: probeMessage(error) };
  }

  try {
    const nonce = `healthz-${Date.now()}-${Math.random().toString(16).slice(2)}`;
    await options.nonceStore.isReplay("__healthz_probe__", nonce, 1000);
    checks.nonceStore = { status: "ok" };
  } catch (error) {
    checks.nonceStore = { status: "error", message: probeMessage(error) };
  }

  const ready = Object.values(checks).every((entry) => entry.status === "ok");
  return { ready, checks };
}

function accountIdOf(params: unknown): string | null {
  if (typeof params === "object" && params !== null && "accountId" in params && typeof params.accountId === "string") {
    return params.accountId;
  }
  return null;
}

export function registerRpc(app: FastifyInstance, options: RegisterRpcOptions) {
  const { coordinator } = options;
  const nowMsFn = options.nowMsFn ?? Date.now;

  // A Map, so names inherited from Object.prototype never resolve to a handler.
  const methods = new Map<string, MethodHandler>(
    Object.entries({
      "health.ping": async () => ({ status: "ok" }),
      "balance.get": async (params) => handleBalanceGet(parseParams(BalanceGetParamsSchema, params), { coordinator }),
      "deposit.claim": async (params) =>
        handleDepositClaim(parseParams(DepositClaimParamsSchema, params), { coordinator }),
      "deposit.status": async (params) =>
        handleDepositStatus(parseParams(DepositStatusParamsSchema, params), { coordinator }),
      "voucher.redeem": async (params) =>
        handleVoucherRedeem(parseParams(VoucherRedeemParamsSchema, params), { coordinator }),
      "conversion.request": async (params) =>
        handleConversionRequest(parseParams(ConversionRequestParamsSchema, params), { coordinator }),
      "conversion.status": async (params) =>
        handleConversionStatus(parseParams(ConversionStatusParamsSchema, params), { coordinator }),
      "pricing.list": async () => handlePricingList({ coordinator }),
    } satisfies Record<string, MethodHandler>),
  );

  function unauthorized(reply: FastifyReply, id: RpcId) {
    return reply.send(rpcErrorResponse(id, RpcErrorCode.UNAUTHORIZED, "Unauthorized"));
  }

  app.get("/healthz/live", async () => {
    return { status: "alive" as const };
  });

  app.get("/healthz/ready", async (req, reply) => {
    try {
      const result = options.readinessProbe ? await options.readinessProbe() : await runDefaultReadinessProbe(options);

      if (!result.ready) {
        return reply.status(503).send({ status: "not_ready", checks: result.checks });
      }
      return reply.send({ status: "ready", checks: result.checks });
    } catch (error) {
      req.log.error(error, "readiness probe failed unexpectedly");
      return reply.status(503).send({
        status: "not_ready",
        checks: {
          storage: { status: "error", message: "probe failure" },
          nonceStore: { status: "error", message: "probe failure" },
        },
      });
    }
  });

  app.post("/rpc", async (req, reply) => {
    const body: unknown = req.body;
    const parsedRequest = RpcRequestSchema.safeParse(body);
    const rawBody = req.rawBody;
    if (!rawBody) {
      return reply
        .status(500)
        .send(
          rpcErrorResponse(
            parsedRequest.success ? parsedRequest.data.id : null,
            RpcErrorCode.INTERNAL_ERROR,
            "Internal error: could not read raw request body.",
          ),
        );
    }
    if (!parsedRequest.success) {
      return reply.send(rpcErrorResponse(null, RpcErrorCode.INVALID_REQUEST, "Invalid Request"));
    }
    const rpc = parsedRequest.data;
    const { appId, ts, nonce, signature } = readSignedHeaders(req.headers);

    const secret = resolveSecretForApp(appId, {
      envSecretMap: options.secretMap,
      envFallbackSecret: options.fallbackSecret,
      onResolve: ({ source }) => {
        if (source !== "env_map") {
          req.log.info({ appId, source }, "RPC secret resolved by fallback source");
        }
      },
    });

    if (!appId || !ts || !nonce || !signature || !secret) {
      return unauthorized(reply, rpc.id);
    }
    if (!isTimestampFresh(ts, nowMsFn(), NONCE_TTL_MS)) {
      return unauthorized(reply, rpc.id);
    }
    // The nonce is only burned once the signature is known to be valid.
    if (!verifyHmac.check({ secret, payload: rawBody, ts, nonce, signature })) {
      return unauthorized(reply, rpc.id);
    }
    if (await options.nonceStore.isReplay(appId, nonce, NONCE_TTL_MS)) {
      return unauthorized(reply, rpc.id);
    }

    const handler = methods.get(rpc.method);
    if (!handler) {
      return reply.send(rpcErrorResponse(rpc.id, RpcErrorCode.METHOD_NOT_FOUND, "Method not found"));
    }

    if (options.rateLimit?.enabled && options.rateLimitStore) {
      const decision = await options.rateLimitStore.consume({
        key: rateLimitKey(appId, accountIdOf(rpc.params)),
        limit: options.rateLimit.maxRequests,
        windowMs: options.rateLimit.windowMs,
      });
      if (!decision.allowed) {
        return reply.send(
          rpcErrorResponse(rpc.id, RpcErrorCode.RATE_LIMITED, "Too many requests", {
            retryAfterMs: Math.max(0, decision.resetAtEpochMs - nowMsFn()),
          }),
        );
      }
    }

    try {
      const result = await handler(rpc.params, { appId });
      return reply.send(rpcResultResponse(rpc.id, result));
    } catch (error) {
      const mapped = toRpcMethodError(error);
      if (mapped) {
        req.log.info({ appId, method: rpc.method, code: mapped.code }, "RPC method rejected");
        return reply.send(rpcErrorResponse(rpc.id, mapped.code, mapped.message, mapped.data));
      }
      req.log.error({ err: error, appId, method: rpc.method }, "RPC method failed");
      return reply.send(rpcErrorResponse(rpc.id, RpcErrorCode.INTERNAL_ERROR, "Internal error"));
    }
  });
}
