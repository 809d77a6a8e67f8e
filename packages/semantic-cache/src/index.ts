/**
 * @sift/semantic-cache: fingerprint-keyed search result cache.
 *
 * Keys partition by intent, query signature and paging; freshness is
 * judged per intent at lookup time; capacity is bounded with LRU eviction.
 */

export { DEFAULT_MAX_ENTRIES, FingerprintCache, type FingerprintCacheOptions } from "./cache.js";
export { embedQuery, makeKey } from "./fingerprint.js";
export { INTENT_TTL_SECONDS, resolveTtl } from "./freshness.js";
export type {
  CacheEntry,
  CacheLookup,
  CachePayload,
  CacheWrite,
  KeyParts,
  SearchIntent,
  SemanticCacheConfig,
} from "./types.js";
export { SEARCH_INTENTS } from "./types.js";
export {
  createSemanticCache,
  type SemanticCacheConfigInput,
  SemanticCacheConfigSchema,
  validateSemanticCacheConfig,
} from "./validation.js";
