/** Max age for envelope deduplication entries (10 minutes) */
export const DUPLICATE_FILTER_TTL_MS = 10 * 60 * 1000;

/** Max entries in the deduplication cache */
export const DUPLICATE_FILTER_MAX_SIZE = 10000;

export interface DuplicateFilterOptions {
  ttlMs?: number;
  maxSize?: number;
  now?: () => number;
}

/**
 * Bounded TTL cache of envelope digests. The same envelope arriving from
 * several neighbours is dispatched once.
 */
export class DuplicateFilter {
  private seen = new Map<string, number>();
  private ttlMs: number;
  private maxSize: number;
  private now: () => number;

  constructor(options: DuplicateFilterOptions = {}) {
    this.ttlMs = options.ttlMs ?? DUPLICATE_FILTER_TTL_MS;
    this.maxSize = options.maxSize ?? DUPLICATE_FILTER_MAX_SIZE;
    this.now = options.now ?? Date.now;
  }

  /**
   * Record a key.
   * @returns true if it was already seen within the TTL
   */
  checkAndRecord(key: string): boolean {
    const now = this.now();

    // Clean up old entries once half full
    if (this.seen.size > this.maxSize / 2) {
      for (const [k, timestamp] of this.seen) {
        if (now - timestamp > this.ttlMs) {
          this.seen.delete(k);
        }
      }
    }

    const seenAt = this.seen.get(key);
    if (seenAt !== undefined && now - seenAt <= this.ttlMs) {
      return true;
    }

    // Evict oldest if still over limit
    if (seenAt === undefined && this.seen.size >= this.maxSize) {
      const firstKey = this.seen.keys().next().value;
      if (firstKey !== undefined) this.seen.delete(firstKey);
    }

    // Re-insert so insertion order stays oldest-first
    this.seen.delete(key);
    this.seen.set(key, now);
    return false;
  }

  get size(): number {
    return this.seen.size;
  }
}
