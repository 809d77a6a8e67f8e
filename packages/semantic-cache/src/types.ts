/**
 * Coarse query categories. Order matters: it breaks ties in intent
 * classification.
 */
export const SEARCH_INTENTS = [
  "news",
  "technical",
  "shopping",
  "academic",
  "finance",
  "local",
  "general",
] as const;

/** Coarse query category; selects the freshness window for cached results. */
export type SearchIntent = (typeof SEARCH_INTENTS)[number];

/**
 * Minimal payload shape the cache inspects. Results may carry a `domain`
 * used by domain invalidation; everything else is opaque.
 */
export interface CachePayload {
  readonly results?: readonly { readonly domain?: string }[];
}

/** Stored cache record */
export interface CacheEntry<P extends CachePayload = CachePayload> {
  readonly key: string;
  readonly intent: SearchIntent;
  readonly embeddingSignature: string;
  readonly payload: P;
  /** Wall-clock milliseconds at insertion */
  readonly createdAt: number;
}

/** What `get` hands back: an independent copy plus its age */
export interface CacheLookup<P extends CachePayload = CachePayload> {
  readonly payload: P;
  readonly ageSeconds: number;
  readonly fresh: boolean;
}

/** Value passed to `set` */
export interface CacheWrite<P extends CachePayload = CachePayload> {
  readonly intent: SearchIntent;
  readonly embeddingSignature: string;
  readonly payload: P;
}

/** Request attributes that partition the cache key space */
export interface KeyParts {
  readonly intent: SearchIntent;
  readonly embeddingSignature: string;
  readonly count: number;
  readonly offset: number;
  readonly page: number;
  readonly site?: string | undefined;
  readonly timePeriod?: string | undefined;
  readonly getRelated: boolean;
  readonly relatedCount?: number | undefined;
}

/** Parsed configuration for a FingerprintCache */
export interface SemanticCacheConfig {
  readonly maxEntries: number;
  readonly ttlOverrides: Partial<Record<SearchIntent, number>>;
}
