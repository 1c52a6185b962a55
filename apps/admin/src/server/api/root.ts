import { accountRouter } from "./routers/account";
import { depositRouter } from "./routers/deposit";
import { pricingRouter } from "./routers/pricing";
import { voucherRouter } from "./routers/voucher";
import { t } from "./trpc";

export const adminRouter = t.router({
  vouchers: voucherRouter,
  accounts: accountRouter,
  pricing: pricingRouter,
  deposits: depositRouter,
});

export type AdminRouter = typeof adminRouter;
export type { AdminCoordinator, TrpcContext } from "./trpc";
