/**
 * @sift/web-search: cached web search with intent-aware freshness
 *
 * Public API surface.
 */

// Cached search pipeline
export { CachedSearch, type CachedSearchOptions, estimateTotal } from "./cached-search.js";
// Intent and ranking
export { classifyIntent } from "./intent.js";
export { INTENT_LEXICON, type IntentLexicon } from "./lexicon.js";
// Middleware
export {
  buildQuery,
  createCachedSearch,
  createSearchMiddleware,
  paginate,
  SearchMiddleware,
  type SearchMiddlewareOptions,
} from "./middleware.js";
export {
  createSpecializedSearchMiddleware,
  SpecializedSearchMiddleware,
  type SpecializedSearchMiddlewareOptions,
} from "./specialized-middleware.js";
export {
  buildDevQuery,
  buildLocationQuery,
  filterByLocation,
  prioritizeTechnical,
  TECHNICAL_SITES,
} from "./specialized.js";
export {
  classifySentiment,
  factCheck,
  factCheckQueries,
  scoreFactCheck,
  verdictFor,
} from "./fact-check.js";
// Providers
export {
  createDuckDuckGoLiteProvider,
  createSearchProvider,
  extractRelatedQueries,
  parseLiteResults,
  unwrapRedirect,
} from "./providers/index.js";
export { rerankResults, scoreResult, tokenize } from "./rerank.js";
// Router
export { createWebSearchRouter, WebSearchRouter, type WebSearchRouterOptions } from "./router.js";
// HTTP + HTML helpers
export { type FetchTextInit, fetchText, resolveUserAgent } from "./fetch-text.js";
export { type HtmlDocument, type HtmlElement, parseDocument, selectAll, textOf } from "./html.js";
// Types
export type {
  CacheMetadata,
  CacheStatus,
  FactCheckReport,
  FactCheckSource,
  IntentClassification,
  SearchBackend,
  SearchBatch,
  SearchIntent,
  SearchOptions,
  SearchPayload,
  SearchProviderConfig,
  SearchRequest,
  SearchResponse,
  SearchResult,
  Sentiment,
  TimePeriod,
  Verdict,
  WebSearchProvider,
} from "./types.js";
export {
  DEFAULT_COUNT,
  DEFAULT_DEV_TOOL_NAME,
  DEFAULT_FACT_CHECK_TOOL_NAME,
  DEFAULT_LOCATION_TOOL_NAME,
  DEFAULT_MAX_SNIPPET_LENGTH,
  DEFAULT_RELATED_COUNT,
  DEFAULT_RELATED_TOOL_NAME,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_TOOL_NAME,
} from "./types.js";
// Utilities
export {
  collapseWhitespace,
  dedupeQueries,
  extractDomain,
  mergeResults,
  truncateSnippet,
} from "./utils.js";
// Validation schemas
export {
  type DevSearchInput,
  DevSearchInputSchema,
  type FactCheckInput,
  FactCheckInputSchema,
  type LocationSearchInput,
  LocationSearchInputSchema,
  MAX_QUERY_LENGTH,
  MAX_STATEMENT_LENGTH,
  parseInput,
  type RelatedSearchesInput,
  RelatedSearchesInputSchema,
  SearchIntentSchema,
  SearchProviderConfigSchema,
  type SearchRequestInput,
  SearchRequestSchema,
  TimePeriodSchema,
  toSearchRequest,
  validateQuery,
  validateWebSearchConfig,
  type WebSearchConfig,
  type WebSearchConfigInput,
  WebSearchConfigSchema,
  type WebSearchToolInput,
  WebSearchToolInputSchema,
} from "./validation.js";
