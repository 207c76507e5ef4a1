export type Clock = () => number;

interface CacheEntry<V> {
  value: V;
  expiresAt: number;
}

export interface TtlCacheOptions {
  ttlMs: number;
  /** 최대 보관 개수 (초과 시 가장 오래된 항목부터 제거) */
  max?: number;
  clock?: Clock;
}

/**
 * 간단 TTL 캐시
 * - 값 교체는 항목 단위로 한 번에 이루어지므로 읽는 쪽이 반쯤 쓰인 값을 볼 일은 없다.
 */
export class TtlCache<V> {
  private readonly map = new Map<string, CacheEntry<V>>();
  private readonly ttlMs: number;
  private readonly max: number;
  private readonly clock: Clock;

  constructor(options: TtlCacheOptions) {
    this.ttlMs = options.ttlMs;
    this.max = Math.max(1, options.max ?? 500);
    this.clock = options.clock ?? Date.now;
  }

  get(key: string): V | undefined {
    const entry = this.map.get(key);
    if (!entry) return undefined;
    if (this.clock() >= entry.expiresAt) {
      this.map.delete(key);
      return undefined;
    }
    return entry.value;
  }

  set(key: string, value: V): void {
    if (!this.map.has(key) && this.map.size >= this.max) {
      const oldest = this.map.keys().next();
      if (!oldest.done) this.map.delete(oldest.value);
    }
    this.map.set(key, { value, expiresAt: this.clock() + this.ttlMs });
  }

  /** 살아 있는 항목을 지웠을 때만 true */
  delete(key: string): boolean {
    const live = this.get(key) !== undefined;
    this.map.delete(key);
    return live;
  }

  /** 전체 무효화, 제거된 항목 수 반환 */
  invalidateAll(): number {
    const count = this.map.size;
    this.map.clear();
    return count;
  }
}

/** 인자 튜플 → 캐시 키 */
export function cacheKeyOf(...parts: ReadonlyArray<string | number>): string {
  return JSON.stringify(parts);
}
