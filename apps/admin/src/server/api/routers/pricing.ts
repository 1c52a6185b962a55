import { z } from "zod";
import { ALL_ADMIN_ROLES, requireRole } from "../../auth/roles";
import { requireActor, requireCoordinator, t, withLedgerErrors } from "../trpc";

const PricingPackageSchema = z.object({
  packageId: z.string().trim().min(1).max(64),
  name: z.string().trim().min(1).max(128),
  unitCount: z.number().int().min(1),
  cost: z.string().trim().min(1),
  active: z.boolean().optional(),
});

export const pricingRouter = t.router({
  list: t.procedure.query(async ({ ctx }) => {
    requireRole(ALL_ADMIN_ROLES, ctx.role);
    return requireCoordinator(ctx).getPricingSnapshot();
  }),

  replace: t.procedure
    .input(z.object({ packages: z.array(PricingPackageSchema).min(1) }))
    .mutation(async ({ ctx, input }) => {
      requireRole(["SUPER_ADMIN"], ctx.role);
      const coordinator = requireCoordinator(ctx);
      const actor = requireActor(ctx);
      return withLedgerErrors(() => coordinator.replacePricingCatalog(input.packages, { actor }));
    }),
});
