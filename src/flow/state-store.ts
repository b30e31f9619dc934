import type { CsrfState, StateStore } from '../types.js';

type Entry = { state: CsrfState; expiresAt: number };

/**
 * Process-local pending-state storage keyed by session id.
 * Suitable for development, tests and single-process deployments; a
 * multi-instance host should back {@link StateStore} with its session or a
 * signed cookie instead.
 */
export class InMemoryStateStore {
  /** Default lifetime of a pending state: 10 minutes */
  public static readonly DEFAULT_TTL_SECONDS = 600;

  private readonly entries = new Map<string, Entry>();

  public constructor(
    private readonly ttlSeconds: number = InMemoryStateStore.DEFAULT_TTL_SECONDS,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * The {@link StateStore} view for one browser session
   */
  public forSession(sessionId: string): StateStore {
    return {
      store: async (state) => {
        this.cleanupExpired();
        this.entries.set(sessionId, {
          state,
          expiresAt: this.now() + this.ttlSeconds * 1000,
        });
      },
      loadAndClear: async () => {
        const entry = this.entries.get(sessionId);
        if (!entry) return undefined;

        this.entries.delete(sessionId);
        return this.now() > entry.expiresAt ? undefined : entry.state;
      },
    };
  }

  /**
   * Drop entries that expired before `beforeTimestamp`
   * @returns Number of entries removed
   */
  public cleanupExpired(beforeTimestamp: number = this.now()): number {
    let removed = 0;
    for (const [key, entry] of this.entries.entries()) {
      if (entry.expiresAt < beforeTimestamp) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  public get size(): number {
    return this.entries.size;
  }
}
