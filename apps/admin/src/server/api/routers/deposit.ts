import { z } from "zod";
import { ALL_ADMIN_ROLES, requireRole } from "../../auth/roles";
import { requireCoordinator, t, withLedgerErrors } from "../trpc";

const TxHashInputSchema = z.object({ txHash: z.string().trim().min(1).max(128) });

export const depositRouter = t.router({
  status: t.procedure.input(TxHashInputSchema).query(async ({ ctx, input }) => {
    requireRole(ALL_ADMIN_ROLES, ctx.role);
    const coordinator = requireCoordinator(ctx);
    return withLedgerErrors(() => coordinator.getDepositClaim(input.txHash));
  }),

  retryCredit: t.procedure.input(TxHashInputSchema).mutation(async ({ ctx, input }) => {
    requireRole(ALL_ADMIN_ROLES, ctx.role);
    const coordinator = requireCoordinator(ctx);
    const outcome = await withLedgerErrors(() => coordinator.retryDepositCredit(input.txHash));
    return {
      status: outcome.status,
      claimStatus: outcome.claim.status,
      lastError: outcome.status === "credit_deferred" ? outcome.error : null,
    };
  }),
});
