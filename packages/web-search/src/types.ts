/**
 * Core types for search providers, the cached search pipeline and the
 * search tools.
 */

import type { SearchIntent } from "@sift/semantic-cache";

export type { SearchIntent };

export type TimePeriod = "day" | "week" | "month" | "year";

// ---------------------------------------------------------------------------
// Provider layer
// ---------------------------------------------------------------------------

/**
 * Normalized search result returned by all providers.
 */
export interface SearchResult {
  readonly title: string;
  readonly url: string;
  readonly description: string;
  readonly domain: string;
  readonly publishedDate?: string;
}

/**
 * One page of provider output.
 */
export interface SearchBatch {
  readonly results: readonly SearchResult[];
  /** Results the provider saw on the page, before truncation to `count` */
  readonly total: number;
  readonly relatedSearches: readonly string[];
}

/**
 * Paging and filter options passed to a provider.
 */
export interface SearchOptions {
  readonly count: number;
  readonly offset: number;
  readonly timePeriod?: TimePeriod | undefined;
}

/**
 * Provider interface: single `search()` method contract.
 */
export interface WebSearchProvider {
  readonly id: string;
  search(query: string, options: SearchOptions, signal?: AbortSignal): Promise<SearchBatch>;
}

/**
 * Configuration for a single search provider instance.
 */
export interface SearchProviderConfig {
  readonly provider: "duckduckgo";
  readonly baseUrl?: string | undefined;
  readonly timeoutMs?: number | undefined;
  /** DuckDuckGo region code, e.g. "us-en"; "wt-wt" means no region */
  readonly region?: string | undefined;
}

// ---------------------------------------------------------------------------
// Cached search pipeline
// ---------------------------------------------------------------------------

/**
 * A fully resolved search request. Every field participates in the cache key.
 */
export interface SearchRequest {
  readonly query: string;
  readonly count: number;
  readonly offset: number;
  readonly page: number;
  readonly site?: string | undefined;
  readonly timePeriod?: TimePeriod | undefined;
  readonly intent?: SearchIntent | undefined;
  readonly getRelated: boolean;
  readonly relatedCount?: number | undefined;
}

/**
 * Whatever performs the external fetch for a cache miss or refresh.
 */
export interface SearchBackend {
  fetch(request: SearchRequest, signal?: AbortSignal): Promise<SearchBatch>;
}

export type CacheStatus = "hit" | "miss" | "refresh";

export interface CacheMetadata {
  readonly status: CacheStatus;
  readonly ageSeconds: number;
}

/**
 * Cached and returned unit of a search.
 */
export interface SearchPayload {
  readonly results: readonly SearchResult[];
  readonly totalResults: number;
  readonly intent: SearchIntent;
  readonly relatedSearches?: readonly string[];
  readonly cacheMetadata: CacheMetadata;
}

// ---------------------------------------------------------------------------
// Tools
// ---------------------------------------------------------------------------

export interface IntentClassification {
  readonly intent: SearchIntent;
  readonly confidence: number;
}

/**
 * Output of the web search tool.
 */
export interface SearchResponse {
  readonly results: readonly SearchResult[];
  readonly totalResults: number;
  readonly page: number;
  readonly totalPages: number;
  readonly hasNext: boolean;
  readonly hasPrevious: boolean;
  readonly intent: SearchIntent;
  readonly intentConfidence: number;
  readonly cache: CacheMetadata;
}

export type Sentiment = "supporting" | "contradicting" | "neutral";

export type Verdict =
  | "Likely True"
  | "Possibly True"
  | "Inconclusive"
  | "Possibly False"
  | "Likely False";

export interface FactCheckSource {
  readonly url: string;
  readonly title: string;
  readonly description: string;
  readonly sentiment: Sentiment;
}

/**
 * Output of the fact check tool. `confidenceScore` runs from -100
 * (contradicted) to 100 (supported).
 */
export interface FactCheckReport {
  readonly statement: string;
  readonly verdict: Verdict;
  readonly confidenceScore: number;
  readonly supportingSources: number;
  readonly contradictingSources: number;
  readonly neutralSources: number;
  readonly sources: readonly FactCheckSource[];
}

/** Default results per page */
export const DEFAULT_COUNT = 10;

/** Default snippet truncation length */
export const DEFAULT_MAX_SNIPPET_LENGTH = 300;

/** Default per-request timeout in milliseconds */
export const DEFAULT_TIMEOUT_MS = 10_000;

/** Default related searches returned when no explicit count is given */
export const DEFAULT_RELATED_COUNT = 10;

/** Default tool names intercepted by the middleware */
export const DEFAULT_TOOL_NAME = "web_search";
export const DEFAULT_RELATED_TOOL_NAME = "related_searches";
export const DEFAULT_DEV_TOOL_NAME = "dev_search";
export const DEFAULT_LOCATION_TOOL_NAME = "location_search";
export const DEFAULT_FACT_CHECK_TOOL_NAME = "fact_check";
