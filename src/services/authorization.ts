import type { UserProfile } from "../db/telemetry-store";

export const ROLE_RANK = {
  farmer: 1,
  tech: 2,
  admin: 3
} as const;

export type Role = keyof typeof ROLE_RANK;

export type Caller = {
  uid: string;
  role: Role;
  tenantId: string | null;
  tenantIds: string[];
};

export type DenyReason = "not_member" | "insufficient_role" | "farmer_multi_tenant";

export type Decision =
  | { allow: true; role: Role }
  | { allow: false; reason: DenyReason };

export function isRole(value: string): value is Role {
  return value === "farmer" || value === "tech" || value === "admin";
}

/** Builds a caller from a stored profile; null when the role is not recognised. */
export function toCaller(profile: UserProfile): Caller | null {
  const role = profile.role.trim().toLowerCase();
  if (!isRole(role)) {
    return null;
  }
  return {
    uid: profile.uid,
    role,
    tenantId: profile.tenantId,
    tenantIds: profile.tenantIds
  };
}

export function isTenantMember(caller: Caller, tenantId: string): boolean {
  return caller.tenantId === tenantId || caller.tenantIds.includes(tenantId);
}

/**
 * Farmers are single-tenant accounts: one holding several tenant ids is
 * denied outright, whichever tenant is requested.
 */
export function authorize(caller: Caller, tenantIdParam: string, minRole: Role): Decision {
  if (caller.role === "farmer" && caller.tenantIds.length > 1) {
    return { allow: false, reason: "farmer_multi_tenant" };
  }
  if (!isTenantMember(caller, tenantIdParam)) {
    return { allow: false, reason: "not_member" };
  }
  if (ROLE_RANK[caller.role] < ROLE_RANK[minRole]) {
    return { allow: false, reason: "insufficient_role" };
  }
  return { allow: true, role: caller.role };
}
