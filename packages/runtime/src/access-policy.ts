import type { AccessPolicy, Session, UserId } from "@parley/types";

/** Only a session's owner may use it. */
export class OwnerAccessPolicy implements AccessPolicy {
  canAccess(userId: UserId, session: Session): boolean {
    return session.ownerId === userId;
  }
}
