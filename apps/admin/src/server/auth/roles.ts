import { TRPCError } from "@trpc/server";
import type { AdminRole } from "@cid-ledger/db";

export const ALL_ADMIN_ROLES: AdminRole[] = ["SUPER_ADMIN", "OPERATOR"];

export function requireRole(required: AdminRole[], actual?: string): asserts actual is AdminRole {
  if (!actual || !required.some((role) => role === actual)) {
    throw new TRPCError({ code: "FORBIDDEN" });
  }
}
