/**
 * CachedSearch: the single call site tying the fingerprint cache to the
 * search backend.
 *
 * Fresh hits return without touching the backend. Misses and stale hits
 * fetch, rerank and (for stale hits) append the previous results after
 * the fresh ones, deduplicated by URL. Every fetched payload is stored.
 */

import { createLogger, type Logger } from "@sift/core";
import {
  createSemanticCache,
  embedQuery,
  type FingerprintCache,
  makeKey,
} from "@sift/semantic-cache";
import {
  annotateActiveSpan,
  recordCacheAccess,
  recordCacheInvalidation,
  withSpan,
} from "@sift/telemetry";
import { rerankResults } from "./rerank.js";
import {
  type CacheMetadata,
  DEFAULT_RELATED_COUNT,
  type SearchBackend,
  type SearchBatch,
  type SearchIntent,
  type SearchPayload,
  type SearchRequest,
} from "./types.js";
import { dedupeQueries, mergeResults } from "./utils.js";

export interface CachedSearchOptions {
  readonly backend: SearchBackend;
  readonly cache?: FingerprintCache<SearchPayload>;
  readonly logger?: Logger;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Estimate the total result count. The provider only reports what one page
 * held, so a full page implies at least one more result beyond it.
 */
export function estimateTotal(batch: SearchBatch, request: SearchRequest): number {
  const returned = batch.results.length;
  let total = Math.max(batch.total, request.offset + returned);
  if (returned >= request.count) {
    total = Math.max(total, request.offset + request.count + 1);
  }
  return total;
}

export class CachedSearch {
  private readonly backend: SearchBackend;
  private readonly cache: FingerprintCache<SearchPayload>;
  private readonly logger: Logger;

  constructor(options: CachedSearchOptions) {
    this.backend = options.backend;
    this.cache = options.cache ?? createSemanticCache<SearchPayload>();
    this.logger = options.logger ?? createLogger("web-search");
  }

  async search(request: SearchRequest, signal?: AbortSignal): Promise<SearchPayload> {
    const intent: SearchIntent = request.intent ?? "general";
    return withSpan("sift.search", { "search.intent": intent }, async () => {
      const payload = await this.resolve(request, intent, signal);
      annotateActiveSpan({
        "search.cache_status": payload.cacheMetadata.status,
        "search.result_count": payload.results.length,
      });
      recordCacheAccess(payload.cacheMetadata.status, intent);
      return payload;
    });
  }

  /**
   * Drop cached payloads holding results from `domain`.
   * @returns Number of cache entries removed
   */
  markDomainStale(domain: string): number {
    const removed = this.cache.markDomainStale(domain);
    recordCacheInvalidation(domain, removed);
    if (removed > 0) {
      this.logger.info(`invalidated ${removed} cached searches for domain "${domain}"`);
    }
    return removed;
  }

  private async resolve(
    request: SearchRequest,
    intent: SearchIntent,
    signal: AbortSignal | undefined,
  ): Promise<SearchPayload> {
    const relatedCount =
      request.relatedCount ?? (request.getRelated ? request.count : undefined);
    const embeddingSignature = embedQuery(request.query);
    const cacheKey = makeKey({
      intent,
      embeddingSignature,
      count: request.count,
      offset: request.offset,
      page: request.page,
      site: request.site,
      timePeriod: request.timePeriod,
      getRelated: request.getRelated,
      relatedCount,
    });

    const lookup = this.cache.get(cacheKey, intent);
    if (lookup?.fresh) {
      this.logger.debug(
        `cache hit for "${request.query}" (age ${lookup.ageSeconds.toFixed(1)}s)`,
      );
      return {
        ...lookup.payload,
        intent,
        cacheMetadata: { status: "hit", ageSeconds: round2(lookup.ageSeconds) },
      };
    }

    const stale = lookup?.payload;
    const batch = await this.backend.fetch(request, signal);
    const reranked = rerankResults(request.query, batch.results, intent);

    const results =
      stale !== undefined && stale.results.length > 0
        ? mergeResults(reranked, stale.results)
        : reranked;

    const cacheMetadata: CacheMetadata =
      lookup !== undefined
        ? { status: "refresh", ageSeconds: round2(lookup.ageSeconds) }
        : { status: "miss", ageSeconds: 0 };

    let payload: SearchPayload = {
      results,
      totalResults: estimateTotal(batch, request),
      intent,
      cacheMetadata,
    };

    if (request.getRelated) {
      let related = dedupeQueries(batch.relatedSearches, relatedCount ?? DEFAULT_RELATED_COUNT);
      if (related.length === 0 && stale?.relatedSearches !== undefined) {
        related = [...stale.relatedSearches];
      }
      payload = { ...payload, relatedSearches: related };
    }

    this.logger.debug(
      `${cacheMetadata.status} for "${request.query}": ${results.length} results (intent=${intent})`,
    );
    this.cache.set(cacheKey, { intent, embeddingSignature, payload });
    return payload;
  }
}
