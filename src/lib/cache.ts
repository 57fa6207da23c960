/**
 * In-memory cache with per-entry TTL.
 *
 * Backs the cache adapter when Redis is not configured or unreachable, and is
 * what tests run against.
 */
export class MemoryTtlCache<T> {
  private entries = new Map<string, { value: T; expiresAt: number }>();
  private cleanupInterval: NodeJS.Timeout | null = null;

  constructor(
    private defaultTtlMs: number = 300_000,
    private maxEntries: number = 5000,
    private now: () => number = Date.now
  ) {
    this.cleanupInterval = setInterval(() => this.cleanup(), Math.max(defaultTtlMs, 60_000));
    // Never keep a process (or a test worker) alive just for cache sweeping.
    this.cleanupInterval.unref();
  }

  get(key: string): T | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    if (this.now() > entry.expiresAt) {
      this.entries.delete(key);
      return undefined;
    }

    return entry.value;
  }

  set(key: string, value: T, ttlMs?: number): void {
    if (!this.entries.has(key) && this.entries.size >= this.maxEntries) {
      const oldestKey = this.entries.keys().next().value;
      if (oldestKey !== undefined) this.entries.delete(oldestKey);
    }

    this.entries.set(key, {
      value,
      expiresAt: this.now() + (ttlMs ?? this.defaultTtlMs)
    });
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  /**
   * Drops every key starting with `prefix`, or everything when no prefix is given.
   */
  invalidate(prefix?: string): number {
    if (!prefix) {
      const count = this.entries.size;
      this.entries.clear();
      return count;
    }

    let removed = 0;
    for (const key of [...this.entries.keys()]) {
      if (key.startsWith(prefix)) {
        this.entries.delete(key);
        removed += 1;
      }
    }
    return removed;
  }

  private cleanup(): void {
    const now = this.now();
    for (const [key, entry] of this.entries.entries()) {
      if (now > entry.expiresAt) {
        this.entries.delete(key);
      }
    }
  }

  destroy(): void {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = null;
    }
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
