/**
 * PRICE CACHE
 *
 * Aligned series held until an absolute expiry instant.
 * Clock is injectable so expiry can be driven from tests.
 */

interface Slot<T> {
  value: T;
  expiresAt: number;
}

export interface CacheStats {
  entries: number;
  keys: string[];
}

export class TtlCache<T> {
  private readonly slots = new Map<string, Slot<T>>();

  constructor(private readonly now: () => number = Date.now) {}

  set(key: string, value: T, ttlMs: number): void {
    this.slots.set(key, { value, expiresAt: this.now() + ttlMs });
  }

  get(key: string): T | null {
    const slot = this.live(key);
    return slot ? slot.value : null;
  }

  /** 0 when absent or expired */
  remainingMs(key: string): number {
    const slot = this.live(key);
    return slot ? slot.expiresAt - this.now() : 0;
  }

  /**
   * Drop keys containing `pattern`, or everything when omitted.
   * Returns how many were dropped.
   */
  invalidate(pattern?: string): number {
    const doomed = [...this.slots.keys()].filter(key => pattern === undefined || key.includes(pattern));
    for (const key of doomed) this.slots.delete(key);
    return doomed.length;
  }

  stats(): CacheStats {
    this.sweep();
    return { entries: this.slots.size, keys: [...this.slots.keys()] };
  }

  private live(key: string): Slot<T> | undefined {
    const slot = this.slots.get(key);
    if (slot && this.now() > slot.expiresAt) {
      this.slots.delete(key);
      return undefined;
    }
    return slot;
  }

  private sweep(): void {
    const now = this.now();
    for (const [key, slot] of this.slots) {
      if (now > slot.expiresAt) this.slots.delete(key);
    }
  }
}

export function buildCacheKey(assets: readonly string[], lookbackDays: number): string {
  return `aligned:${assets.join(',')}:${lookbackDays}`;
}
