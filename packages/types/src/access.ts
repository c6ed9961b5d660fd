import type { UserId } from "./foundational.js";
import type { Session } from "./session.js";

/**
 * Decides whether an authenticated user may operate on a session.
 * Authentication itself happens upstream; this only sees the resolved user id.
 */
export interface AccessPolicy {
  canAccess(userId: UserId, session: Session): boolean;
}
