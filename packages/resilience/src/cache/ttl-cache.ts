/**
 * Simple TTL cache for values fetched from the node.
 *
 * Timer-based cleanup is opt-in via startAutoCleanup()/stopAutoCleanup()
 * to avoid timer leaks in tests and short-lived processes.
 */

interface CacheEntry<V> {
  expiry: number;
  value: V;
}

const DEFAULT_TTL_MS = 30_000;

export class TtlCache<V> {
  private cache = new Map<string, CacheEntry<V>>();
  private cleanupTimer?: ReturnType<typeof setInterval> | undefined;

  constructor(private readonly ttlMs = DEFAULT_TTL_MS) {}

  get size(): number {
    return this.cache.size;
  }

  get(key: string): V | undefined {
    const entry = this.cache.get(key);
    if (!entry) {
      return undefined;
    }
    if (entry.expiry <= Date.now()) {
      this.cache.delete(key);
      return undefined;
    }
    return entry.value;
  }

  has(key: string): boolean {
    return this.get(key) !== undefined;
  }

  set(key: string, value: V): void {
    this.cache.set(key, {
      expiry: Date.now() + this.ttlMs,
      value,
    });
  }

  cleanup(): void {
    const now = Date.now();
    for (const [key, entry] of this.cache.entries()) {
      if (entry.expiry <= now) {
        this.cache.delete(key);
      }
    }
  }

  startAutoCleanup(): void {
    if (this.cleanupTimer) return;
    this.cleanupTimer = setInterval(() => this.cleanup(), this.ttlMs);
    // Never keeps the process alive on its own
    this.cleanupTimer.unref?.();
  }

  stopAutoCleanup(): void {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = undefined;
    }
  }

  clear(): void {
    this.stopAutoCleanup();
    this.cache.clear();
  }
}
