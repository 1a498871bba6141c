import type { GraceSnapshot } from '../models/lock.js';

/**
 * Remembers the last successful unlock per app key.
 *
 * The grace length is read on every lookup, so a policy reload applies to
 * windows that are already open. Expired entries are dropped when they are
 * next looked at; there is no sweep.
 */
export class GraceTracker {
  private readonly entries = new Map<string, number>();

  constructor(private readonly gracePeriodMs: () => number) {}

  isInGrace(appKey: string, now: number): boolean {
    return this.remainingMs(appKey, now) > 0;
  }

  /**
   * Time left in the window, 0 when there is none.
   */
  remainingMs(appKey: string, now: number): number {
    const verifiedAt = this.entries.get(appKey);
    if (verifiedAt === undefined) return 0;

    const remaining = verifiedAt + this.gracePeriodMs() - now;
    if (remaining <= 0) {
      this.entries.delete(appKey);
      return 0;
    }
    return remaining;
  }

  record(appKey: string, now: number): void {
    this.entries.set(appKey, now);
  }

  /** @returns whether an entry was removed */
  clear(appKey: string): boolean {
    return this.entries.delete(appKey);
  }

  clearAll(): number {
    const count = this.entries.size;
    this.entries.clear();
    return count;
  }

  /** Unexpired entries, evicting the rest. */
  list(now: number): GraceSnapshot[] {
    const out: GraceSnapshot[] = [];
    for (const [appKey, verifiedAt] of [...this.entries]) {
      const remainingMs = this.remainingMs(appKey, now);
      if (remainingMs > 0) out.push({ appKey, verifiedAt, remainingMs });
    }
    return out;
  }

  get size(): number {
    return this.entries.size;
  }
}
