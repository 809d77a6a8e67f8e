/**
 * FingerprintCache: bounded, recency-ordered store of search payloads.
 *
 * Entries are keyed by request fingerprint and judged fresh against the
 * TTL of the intent supplied at lookup time. Stale entries are still
 * returned so callers can merge them with a refresh.
 */

import { type Clock, systemClock } from "@sift/core";
import { ConfigInvalidError } from "@sift/errors";
import { LRUCache } from "lru-cache";
import { resolveTtl } from "./freshness.js";
import type {
  CacheEntry,
  CacheLookup,
  CachePayload,
  CacheWrite,
  SearchIntent,
  SemanticCacheConfig,
} from "./types.js";

export const DEFAULT_MAX_ENTRIES = 256;

export interface FingerprintCacheOptions {
  readonly maxEntries?: number;
  readonly ttlOverrides?: Partial<Record<SearchIntent, number>>;
  readonly clock?: Clock;
}

export class FingerprintCache<P extends CachePayload = CachePayload> {
  private readonly store: LRUCache<string, CacheEntry<P>>;
  private readonly ttlOverrides: Partial<Record<SearchIntent, number>>;
  private readonly clock: Clock;
  readonly maxEntries: number;

  /**
   * @throws ConfigInvalidError when maxEntries is not a positive integer
   */
  constructor(options: FingerprintCacheOptions = {}) {
    const maxEntries = options.maxEntries ?? DEFAULT_MAX_ENTRIES;
    if (!Number.isInteger(maxEntries) || maxEntries < 1) {
      throw new ConfigInvalidError("semantic-cache", [
        {
          field: "maxEntries",
          message: "maxEntries must be a positive integer",
          code: "invalid_value",
          value: maxEntries,
        },
      ]);
    }
    this.maxEntries = maxEntries;
    this.ttlOverrides = options.ttlOverrides ?? {};
    this.clock = options.clock ?? systemClock;
    this.store = new LRUCache<string, CacheEntry<P>>({ max: this.maxEntries });
  }

  /** Number of stored entries */
  get size(): number {
    return this.store.size;
  }

  /** Membership test; does not touch recency. */
  has(key: string): boolean {
    return this.store.has(key);
  }

  /** Freshness window in seconds for an intent, overrides applied. */
  ttlFor(intent: SearchIntent): number {
    return resolveTtl(intent, this.ttlOverrides);
  }

  /**
   * Look up an entry. Returns a deep copy of the payload, its age in
   * seconds and whether it is within the TTL of `intent`. Only fresh hits
   * move the entry to most-recently-used.
   */
  get(key: string, intent: SearchIntent): CacheLookup<P> | undefined {
    const entry = this.store.peek(key);
    if (entry === undefined) return undefined;

    const ageSeconds = Math.max(0, (this.clock.now() - entry.createdAt) / 1000);
    const fresh = ageSeconds <= this.ttlFor(intent);
    if (fresh) {
      // peek() leaves order untouched; get() bumps recency
      this.store.get(key);
    }

    return { payload: structuredClone(entry.payload), ageSeconds, fresh };
  }

  /**
   * Store (or replace) an entry as most-recently-used, evicting the least
   * recently used one when over capacity.
   */
  set(key: string, write: CacheWrite<P>): void {
    this.store.set(key, {
      key,
      intent: write.intent,
      embeddingSignature: write.embeddingSignature,
      payload: structuredClone(write.payload),
      createdAt: this.clock.now(),
    });
  }

  /**
   * Drop every entry holding a result whose domain contains `domain`
   * (case-insensitive). Returns the number of entries removed.
   */
  markDomainStale(domain: string): number {
    const needle = domain.trim().toLowerCase();
    if (needle === "") return 0;

    const doomed: string[] = [];
    for (const [key, entry] of this.store.entries()) {
      const results = entry.payload.results ?? [];
      if (results.some((result) => (result.domain ?? "").toLowerCase().includes(needle))) {
        doomed.push(key);
      }
    }
    for (const key of doomed) {
      this.store.delete(key);
    }
    return doomed.length;
  }

  clear(): void {
    this.store.clear();
  }
}

/**
 * Construct a cache from an already-validated config.
 */
export function fromConfig<P extends CachePayload>(
  config: SemanticCacheConfig,
  clock?: Clock,
): FingerprintCache<P> {
  return new FingerprintCache<P>({
    maxEntries: config.maxEntries,
    ttlOverrides: config.ttlOverrides,
    ...(clock !== undefined ? { clock } : {}),
  });
}
