interface CacheEntry<T> {
  value: T;
  expiresAt: number;
}

/**
 * Time-bounded cache. An entry is served while `now < expiresAt` and is
 * evicted on the first lookup after that.
 */
export class InsightCache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();

  get(key: string, now: Date): T | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (now.getTime() >= entry.expiresAt) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  set(key: string, value: T, expiresAt: Date, now: Date): void {
    this.prune(now);
    this.entries.set(key, { value, expiresAt: expiresAt.getTime() });
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }

  private prune(now: Date): void {
    for (const [key, entry] of this.entries) {
      if (now.getTime() >= entry.expiresAt) this.entries.delete(key);
    }
  }
}
