import { z } from "zod";
import { ALL_ADMIN_ROLES, requireRole } from "../../auth/roles";
import { requireActor, requireCoordinator, t, withLedgerErrors } from "../trpc";

const AccountIdSchema = z.string().trim().min(1).max(128);

export const accountRouter = t.router({
  balance: t.procedure.input(z.object({ accountId: AccountIdSchema })).query(async ({ ctx, input }) => {
    requireRole(ALL_ADMIN_ROLES, ctx.role);
    return requireCoordinator(ctx).getBalance(input.accountId);
  }),

  events: t.procedure.input(z.object({ accountId: AccountIdSchema })).query(async ({ ctx, input }) => {
    requireRole(ALL_ADMIN_ROLES, ctx.role);
    return requireCoordinator(ctx).listLedgerEvents(input.accountId);
  }),

  // A negative amount debits. The adjustment id makes retries of the same adjustment a no-op.
  adjustBalance: t.procedure
    .input(
      z.object({
        accountId: AccountIdSchema,
        adjustmentId: z.string().trim().min(1).max(128),
        amount: z.string().trim().regex(/^-?\d+(\.\d+)?$/, "expected a signed decimal amount"),
        note: z.string().trim().min(1).max(500),
      }),
    )
    .mutation(async ({ ctx, input }) => {
      requireRole(["SUPER_ADMIN"], ctx.role);
      const coordinator = requireCoordinator(ctx);
      const actor = requireActor(ctx);

      const result = await withLedgerErrors(() => coordinator.adjustBalance({ ...input, actor }));
      return { applied: result.applied, balance: result.account.balance, event: result.event };
    }),

  suspend: t.procedure
    .input(z.object({ accountId: AccountIdSchema, reason: z.string().trim().min(1).max(500) }))
    .mutation(async ({ ctx, input }) => {
      requireRole(ALL_ADMIN_ROLES, ctx.role);
      const coordinator = requireCoordinator(ctx);
      const account = await coordinator.suspendAccount({ ...input, actor: requireActor(ctx) });
      return { accountId: account.id, status: account.status, suspendedReason: account.suspendedReason };
    }),

  reactivate: t.procedure.input(z.object({ accountId: AccountIdSchema })).mutation(async ({ ctx, input }) => {
    requireRole(["SUPER_ADMIN"], ctx.role);
    const coordinator = requireCoordinator(ctx);
    const account = await coordinator.reactivateAccount({ ...input, actor: requireActor(ctx) });
    return { accountId: account.id, status: account.status, suspendedReason: account.suspendedReason };
  }),
});
