import { FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";
import type { TelemetryStore } from "../db/telemetry-store";
import { authorize, toCaller, type DenyReason, type Role } from "../services/authorization";
import { safeEqual } from "../utils/crypto";
import { sendApiError } from "./api-error";

const tokenClaimsSchema = z.object({
  uid: z.string().min(1)
});

const tenantParamsSchema = z.object({
  tenantId: z.string().min(1)
});

const DENY_MESSAGES: Record<DenyReason, string> = {
  not_member: "User not allowed for this tenant.",
  insufficient_role: "Insufficient role.",
  farmer_multi_tenant: "Farmer accounts may belong to a single tenant only."
};

function firstValue(value: string | string[] | undefined): string | null {
  if (!value) {
    return null;
  }
  if (Array.isArray(value)) {
    return value[0] ?? null;
  }
  return value;
}

function readQueryKey(query: unknown): string | null {
  if (!query || typeof query !== "object") {
    return null;
  }
  const value: unknown = Reflect.get(query, "k");
  return typeof value === "string" ? value : null;
}

/** Device credential: `x-api-key` header or `k` query parameter. */
export function requireIngestKey(expectedKey: string) {
  return async function ingestKeyGuard(request: FastifyRequest, reply: FastifyReply) {
    const provided = firstValue(request.headers["x-api-key"]) ?? readQueryKey(request.query);
    if (!provided) {
      return sendApiError(reply, 401, "unauthorized", "Missing API key.");
    }
    if (!safeEqual(provided, expectedKey)) {
      return sendApiError(reply, 401, "unauthorized", "API key is invalid.");
    }
  };
}

export async function authenticate(request: FastifyRequest, reply: FastifyReply) {
  try {
    await request.jwtVerify();
  } catch {
    return sendApiError(reply, 401, "unauthorized", "Authentication required.");
  }

  if (!tokenClaimsSchema.safeParse(request.user).success) {
    return sendApiError(reply, 401, "unauthorized", "Token is missing the uid claim.");
  }
}

/**
 * Loads the caller profile for the token's uid and checks it against the
 * `:tenantId` route parameter. Runs after {@link authenticate}.
 */
export function requireTenantRole(store: TelemetryStore, minRole: Role) {
  return async function tenantRoleGuard(request: FastifyRequest, reply: FastifyReply) {
    const params = tenantParamsSchema.safeParse(request.params);
    if (!params.success) {
      return sendApiError(reply, 400, "validation_error", "Invalid tenant id.", params.error.flatten());
    }

    const profile = await store.getUserProfile(request.user.uid);
    if (!profile) {
      return sendApiError(reply, 403, "forbidden", "User profile not found.");
    }

    const caller = toCaller(profile);
    if (!caller) {
      return sendApiError(reply, 403, "forbidden", "Invalid role.");
    }

    const decision = authorize(caller, params.data.tenantId, minRole);
    if (!decision.allow) {
      request.log.info(
        { uid: caller.uid, tenant_id: params.data.tenantId, reason: decision.reason },
        "tenant_access_denied"
      );
      return sendApiError(reply, 403, "forbidden", DENY_MESSAGES[decision.reason], { reason: decision.reason });
    }
  };
}
