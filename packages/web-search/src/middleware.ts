/**
 * SearchMiddleware: wrapToolCall integration for the agent pipeline.
 *
 * Claims two tools: web search (paged results with intent and cache
 * metadata) and related searches (suggested follow-up queries).
 */

import {
  createLogger,
  type Logger,
  type SiftMiddleware,
  type ToolHandler,
  type ToolRequest,
  type ToolResponse,
} from "@sift/core";
import { createSemanticCache } from "@sift/semantic-cache";
import { CachedSearch } from "./cached-search.js";
import { classifyIntent } from "./intent.js";
import { createWebSearchRouter } from "./router.js";
import {
  DEFAULT_RELATED_TOOL_NAME,
  DEFAULT_TOOL_NAME,
  type SearchPayload,
  type SearchResponse,
  type TimePeriod,
} from "./types.js";
import { dedupeQueries } from "./utils.js";
import {
  parseInput,
  RelatedSearchesInputSchema,
  validateWebSearchConfig,
  type WebSearchConfig,
  type WebSearchConfigInput,
  WebSearchToolInputSchema,
} from "./validation.js";

const DATE_OPERATOR: Record<TimePeriod, string> = {
  day: "d",
  week: "w",
  month: "m",
  year: "y",
};

/**
 * Append `site:` and `date:` operators to a query. An explicit `site:`
 * already in the query is left alone.
 */
export function buildQuery(query: string, site?: string, timePeriod?: TimePeriod): string {
  let built = query;
  if (site !== undefined && !built.includes("site:")) {
    built = `${built} site:${site}`;
  }
  if (timePeriod !== undefined) {
    built = `${built} date:${DATE_OPERATOR[timePeriod]}`;
  }
  return built;
}

/**
 * Page arithmetic for a response; an empty result set still has one page.
 */
export function paginate(
  totalResults: number,
  count: number,
  page: number,
): Pick<SearchResponse, "totalPages" | "hasNext" | "hasPrevious"> {
  const totalPages = totalResults > 0 ? Math.ceil(totalResults / count) : 1;
  return { totalPages, hasNext: page < totalPages, hasPrevious: page > 1 };
}

export interface SearchMiddlewareOptions {
  readonly toolName?: string;
  readonly relatedToolName?: string;
  readonly logger?: Logger;
}

export class SearchMiddleware implements SiftMiddleware {
  readonly name = "web-search";
  private readonly search: CachedSearch;
  private readonly toolName: string;
  private readonly relatedToolName: string;
  private readonly logger: Logger;

  constructor(search: CachedSearch, options: SearchMiddlewareOptions = {}) {
    this.search = search;
    this.toolName = options.toolName ?? DEFAULT_TOOL_NAME;
    this.relatedToolName = options.relatedToolName ?? DEFAULT_RELATED_TOOL_NAME;
    this.logger = options.logger ?? createLogger("web-search");
  }

  async wrapToolCall(req: ToolRequest, next: ToolHandler): Promise<ToolResponse> {
    if (req.toolName === this.toolName) {
      return this.webSearch(req.input);
    }
    if (req.toolName === this.relatedToolName) {
      return this.relatedSearches(req.input);
    }
    return next(req);
  }

  private async webSearch(input: unknown): Promise<ToolResponse> {
    const args = parseInput(WebSearchToolInputSchema, input, `${this.toolName} input`);
    const query = buildQuery(args.query, args.site, args.timePeriod);
    const { intent, confidence } = classifyIntent(query);
    this.logger.debug(`${this.toolName}: "${query}" page ${args.page} (intent=${intent})`);

    const payload: SearchPayload = await this.search.search({
      query,
      count: args.count,
      offset: (args.page - 1) * args.count,
      page: args.page,
      site: args.site,
      timePeriod: args.timePeriod,
      intent,
      getRelated: false,
    });

    const response: SearchResponse = {
      results: payload.results,
      totalResults: payload.totalResults,
      page: args.page,
      ...paginate(payload.totalResults, args.count, args.page),
      intent,
      intentConfidence: confidence,
      cache: payload.cacheMetadata,
    };

    return {
      output: response,
      metadata: {
        provider: "web-search",
        resultCount: response.results.length,
        cacheStatus: payload.cacheMetadata.status,
      },
    };
  }

  private async relatedSearches(input: unknown): Promise<ToolResponse> {
    const args = parseInput(RelatedSearchesInputSchema, input, `${this.relatedToolName} input`);
    const payload = await this.search.search({
      query: args.query,
      count: args.count,
      offset: 0,
      page: 1,
      getRelated: true,
    });
    const related = dedupeQueries(payload.relatedSearches ?? [], args.count);

    return {
      output: related,
      metadata: {
        provider: "web-search",
        resultCount: related.length,
        cacheStatus: payload.cacheMetadata.status,
      },
    };
  }
}

/**
 * Build the cached search pipeline (provider router + fingerprint cache)
 * from already-validated configuration.
 */
export function createCachedSearch(
  config: WebSearchConfig,
  logger: Logger = createLogger("web-search"),
): CachedSearch {
  return new CachedSearch({
    backend: createWebSearchRouter(config.providers, config.maxSnippetLength, { logger }),
    cache: createSemanticCache<SearchPayload>(config.cache),
    logger,
  });
}

/**
 * Factory: creates a validated SearchMiddleware backed by the configured
 * providers and a fresh cache.
 */
export function createSearchMiddleware(
  config: WebSearchConfigInput = {},
  logger: Logger = createLogger("web-search"),
): SearchMiddleware {
  const parsed = validateWebSearchConfig(config);
  return new SearchMiddleware(createCachedSearch(parsed, logger), {
    toolName: parsed.toolName,
    relatedToolName: parsed.relatedToolName,
    logger,
  });
}
