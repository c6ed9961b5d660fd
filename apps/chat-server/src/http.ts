import type { Context, MiddlewareHandler } from "hono";
import type { ZodError } from "zod";
import type { ParleyErrorCode, SessionId, UserId } from "@parley/types";

export type AppEnv = { Variables: { userId: UserId } };

export type ErrorStatus = 400 | 401 | 403 | 404 | 409 | 500;

const STATUS_BY_CODE: Partial<Record<ParleyErrorCode, ErrorStatus>> = {
  INVALID_MESSAGE: 400,
  SESSION_ACCESS_DENIED: 403,
  SESSION_NOT_FOUND: 404,
  TURN_NOT_FOUND: 404,
  RUN_ALREADY_IN_PROGRESS: 409,
  SESSION_ARCHIVED: 409,
};

export function statusForCode(code: ParleyErrorCode): ErrorStatus {
  return STATUS_BY_CODE[code] ?? 500;
}

export async function readJsonBody(c: Context): Promise<unknown> {
  try {
    return await c.req.json();
  } catch {
    return null;
  }
}

export function jsonError(c: Context, status: ErrorStatus, error: string, message: string) {
  return c.json({ error, message }, status);
}

export function formatZodError(error: ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`).join("; ");
}

/** Identity is resolved upstream and forwarded in `x-user-id`. */
export function currentUserId(c: Context): UserId | undefined {
  const header = c.req.header("x-user-id")?.trim();
  return header ? (header as UserId) : undefined;
}

export const requireUser: MiddlewareHandler<AppEnv> = async (c, next) => {
  const userId = currentUserId(c);
  if (!userId) return jsonError(c, 401, "UNAUTHENTICATED", "Missing x-user-id header");
  c.set("userId", userId);
  await next();
};

export function sessionIdParam(c: Context): SessionId {
  return (c.req.param("sessionId") ?? "") as SessionId;
}
