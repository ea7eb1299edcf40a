/**
 * In-memory replay guard with TTL.
 * Maps request signature (hex of the signature bytes) → first-seen time.
 *
 * A signed request is accepted once. Entries only need to outlive the
 * request max age: anything older is refused by the timestamp check anyway.
 * Restart clears the set (stale-timestamp check still applies).
 */

const DEFAULT_TTL_MS = 10 * 60 * 1000; // 10 minutes

export class ReplayGuard {
  private readonly seen = new Map<string, number>();
  private readonly ttlMs: number;

  constructor(ttlMs: number = DEFAULT_TTL_MS) {
    this.ttlMs = ttlMs;
  }

  /** Record a signature. Returns false if it was already seen. */
  accept(sig: string, now: number = Date.now()): boolean {
    const firstSeen = this.seen.get(sig);
    if (firstSeen !== undefined && now - firstSeen <= this.ttlMs) return false;
    this.seen.set(sig, now);
    return true;
  }

  /** Evict expired entries. Call periodically. */
  cleanup(now: number = Date.now()): void {
    for (const [sig, firstSeen] of this.seen) {
      if (now - firstSeen > this.ttlMs) this.seen.delete(sig);
    }
  }

  size(): number {
    return this.seen.size;
  }
}
