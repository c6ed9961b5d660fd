import type { EventBus, SessionId, SessionStore, Subscription, Turn } from "@parley/types";
import { SessionNotFoundError } from "@parley/core";

export type WindowUnit = "turns" | "rounds";

export interface ContextWindowOptions {
  /** Window size in `unit`s. Default 10. */
  readonly size?: number;
  /** "rounds" counts a user+agent pair as one. Default "turns". */
  readonly unit?: WindowUnit;
  /** When given, cached windows are dropped on `turn.persisted` and `session.deleted`. */
  readonly bus?: EventBus;
}

interface CachedWindow {
  readonly latestOrdinal: number;
  readonly limit: number;
  readonly turns: readonly Turn[];
}

/**
 * Builds the bounded history a run is given: the newest finalized turns,
 * oldest first. Only persisted turns are visible, so the in-flight turn is
 * never part of it.
 */
export class ContextWindowManager {
  private readonly size: number;
  private readonly unit: WindowUnit;
  private readonly cache = new Map<SessionId, CachedWindow>();
  private readonly subscription?: Subscription;

  constructor(
    private readonly store: SessionStore,
    options: ContextWindowOptions = {}
  ) {
    this.size = options.size ?? 10;
    this.unit = options.unit ?? "turns";
    this.subscription = options.bus?.subscribe(
      { topics: ["turn.persisted", "session.deleted"] },
      (event) => {
        if (event.sessionId) this.invalidate(event.sessionId);
      }
    );
  }

  async buildContext(sessionId: SessionId, windowSize = this.size): Promise<Turn[]> {
    if (!Number.isInteger(windowSize) || windowSize < 0) {
      throw new RangeError(`Window size must be a non-negative integer, got ${windowSize}`);
    }
    const session = await this.store.getSession(sessionId);
    if (!session) throw new SessionNotFoundError(sessionId);

    const limit = this.unit === "rounds" ? windowSize * 2 : windowSize;
    if (limit === 0) return [];

    const latestOrdinal = await this.store.latestOrdinal(sessionId);
    const cached = this.cache.get(sessionId);
    if (cached && cached.latestOrdinal === latestOrdinal && cached.limit === limit) {
      return [...cached.turns];
    }

    const turns = await this.store.listTurns(sessionId, { limit });
    this.cache.set(sessionId, { latestOrdinal, limit, turns });
    return [...turns];
  }

  invalidate(sessionId: SessionId): void {
    this.cache.delete(sessionId);
  }

  dispose(): void {
    this.subscription?.unsubscribe();
    this.cache.clear();
  }
}
