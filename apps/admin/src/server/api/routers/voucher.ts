import { z } from "zod";
import { ALL_ADMIN_ROLES, requireRole } from "../../auth/roles";
import { requireActor, requireCoordinator, t, withLedgerErrors } from "../trpc";

const CreateVouchersInputSchema = z.object({
  count: z.number().int().min(1).max(100),
  value: z.string().trim().min(1),
  prefix: z.string().trim().min(1).max(8).optional(),
  customCode: z.string().trim().min(1).optional(),
  expiresInDays: z.number().int().min(1).optional(),
});

export const voucherRouter = t.router({
  create: t.procedure.input(CreateVouchersInputSchema).mutation(async ({ ctx, input }) => {
    requireRole(["SUPER_ADMIN"], ctx.role);
    const coordinator = requireCoordinator(ctx);
    const createdBy = requireActor(ctx);

    const vouchers = await withLedgerErrors(() => coordinator.createVouchers({ ...input, createdBy }));
    return {
      codes: vouchers.map((voucher) => voucher.code),
      value: vouchers[0]?.value ?? input.value,
      expiresAt: vouchers[0]?.expiresAt ?? null,
    };
  }),

  stats: t.procedure.query(async ({ ctx }) => {
    requireRole(ALL_ADMIN_ROLES, ctx.role);
    return requireCoordinator(ctx).getVoucherStats();
  }),
});
