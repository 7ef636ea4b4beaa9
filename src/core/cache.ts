import { JsonDocument } from '../types';

interface CacheEntry {
  key: string;
  payload: JsonDocument;
  storedAt: number;
  ttlMs: number;
}

export interface TtlCacheOptions {
  /** Clock in milliseconds; replaced in tests to simulate expiry */
  now?: () => number;
}

/**
 * Process-local cache of upstream payloads with per-entry expiry.
 *
 * There is no capacity bound and no LRU: the fetched dataset is small and
 * entries live for seconds, so TTL expiry alone keeps the map small. Expired
 * entries are dropped when looked up or overwritten by the next put.
 *
 * Payloads are copied on the way in and out so callers never share a
 * reference with the stored entry.
 */
export class TtlCache {
  private entries = new Map<string, CacheEntry>();
  private now: () => number;

  constructor(options: TtlCacheOptions = {}) {
    this.now = options.now || Date.now;
  }

  /**
   * Return the payload for `key`, or undefined if absent or expired
   */
  get(key: string): JsonDocument | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    if (this.now() >= entry.storedAt + entry.ttlMs) {
      this.entries.delete(key);
      return undefined;
    }

    return structuredClone(entry.payload);
  }

  put(key: string, payload: JsonDocument, ttlMs: number): void {
    this.entries.set(key, {
      key,
      payload: structuredClone(payload),
      storedAt: this.now(),
      ttlMs,
    });
  }

  /**
   * Number of entries held, expired ones included until looked up
   */
  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}
