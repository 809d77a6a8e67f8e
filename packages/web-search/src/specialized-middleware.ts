/**
 * SpecializedSearchMiddleware: search tools with a fixed intent or their
 * own post-processing, all answered through the same CachedSearch.
 *
 * - dev_search: technical intent, known developer sites first
 * - location_search: local intent, results that mention the place
 * - fact_check: several phrasings of a statement, scored by keyword lean
 */

import {
  createLogger,
  type Logger,
  type SiftMiddleware,
  type ToolHandler,
  type ToolRequest,
  type ToolResponse,
} from "@sift/core";
import type { CachedSearch } from "./cached-search.js";
import { factCheck } from "./fact-check.js";
import { createCachedSearch } from "./middleware.js";
import {
  buildDevQuery,
  buildLocationQuery,
  filterByLocation,
  prioritizeTechnical,
} from "./specialized.js";
import {
  DEFAULT_DEV_TOOL_NAME,
  DEFAULT_FACT_CHECK_TOOL_NAME,
  DEFAULT_LOCATION_TOOL_NAME,
  type SearchIntent,
  type SearchPayload,
  type SearchResponse,
  type SearchResult,
} from "./types.js";
import {
  DevSearchInputSchema,
  FactCheckInputSchema,
  LocationSearchInputSchema,
  parseInput,
  validateWebSearchConfig,
  type WebSearchConfigInput,
} from "./validation.js";

export interface SpecializedSearchMiddlewareOptions {
  readonly devToolName?: string;
  readonly locationToolName?: string;
  readonly factCheckToolName?: string;
  readonly logger?: Logger;
}

/** A single-page response under an intent the tool chose itself. */
function singlePage(
  results: readonly SearchResult[],
  totalResults: number,
  intent: SearchIntent,
  payload: SearchPayload,
): SearchResponse {
  return {
    results,
    totalResults,
    page: 1,
    totalPages: 1,
    hasNext: false,
    hasPrevious: false,
    intent,
    intentConfidence: 1,
    cache: payload.cacheMetadata,
  };
}

export class SpecializedSearchMiddleware implements SiftMiddleware {
  readonly name = "specialized-search";
  private readonly search: CachedSearch;
  private readonly devToolName: string;
  private readonly locationToolName: string;
  private readonly factCheckToolName: string;
  private readonly logger: Logger;

  constructor(search: CachedSearch, options: SpecializedSearchMiddlewareOptions = {}) {
    this.search = search;
    this.devToolName = options.devToolName ?? DEFAULT_DEV_TOOL_NAME;
    this.locationToolName = options.locationToolName ?? DEFAULT_LOCATION_TOOL_NAME;
    this.factCheckToolName = options.factCheckToolName ?? DEFAULT_FACT_CHECK_TOOL_NAME;
    this.logger = options.logger ?? createLogger("web-search");
  }

  async wrapToolCall(req: ToolRequest, next: ToolHandler): Promise<ToolResponse> {
    switch (req.toolName) {
      case this.devToolName:
        return this.devSearch(req.input);
      case this.locationToolName:
        return this.locationSearch(req.input);
      case this.factCheckToolName:
        return this.factCheck(req.input);
      default:
        return next(req);
    }
  }

  private async devSearch(input: unknown): Promise<ToolResponse> {
    const args = parseInput(DevSearchInputSchema, input, `${this.devToolName} input`);
    const query = buildDevQuery(args.query, args.language, args.framework, args.site);
    this.logger.debug(`${this.devToolName}: "${query}"`);

    const payload = await this.search.search({
      query,
      count: args.count,
      offset: 0,
      page: 1,
      site: args.site,
      intent: "technical",
      getRelated: false,
    });
    const results = prioritizeTechnical(payload.results, args.count);

    return {
      output: singlePage(results, payload.totalResults, "technical", payload),
      metadata: {
        provider: "web-search",
        resultCount: results.length,
        cacheStatus: payload.cacheMetadata.status,
      },
    };
  }

  private async locationSearch(input: unknown): Promise<ToolResponse> {
    const args = parseInput(LocationSearchInputSchema, input, `${this.locationToolName} input`);
    const query = buildLocationQuery(args.query, args.location, args.serviceType, args.radiusKm);
    this.logger.debug(`${this.locationToolName}: "${query}"`);

    const payload = await this.search.search({
      query,
      count: args.count,
      offset: 0,
      page: 1,
      intent: "local",
      getRelated: false,
    });
    const results = filterByLocation(payload.results, args.location, args.count);

    return {
      output: singlePage(results, results.length, "local", payload),
      metadata: {
        provider: "web-search",
        resultCount: results.length,
        cacheStatus: payload.cacheMetadata.status,
      },
    };
  }

  private async factCheck(input: unknown): Promise<ToolResponse> {
    const args = parseInput(FactCheckInputSchema, input, `${this.factCheckToolName} input`);
    const report = await factCheck(this.search, args.statement, args.minSources);
    this.logger.info(
      `${this.factCheckToolName}: "${args.statement}" is ${report.verdict} (score ${report.confidenceScore})`,
    );

    return {
      output: report,
      metadata: {
        provider: "web-search",
        resultCount: report.sources.length,
        verdict: report.verdict,
      },
    };
  }
}

/**
 * Factory: creates a validated SpecializedSearchMiddleware. Pass the
 * CachedSearch of a SearchMiddleware to share its cache.
 */
export function createSpecializedSearchMiddleware(
  config: WebSearchConfigInput = {},
  logger: Logger = createLogger("web-search"),
  search?: CachedSearch,
): SpecializedSearchMiddleware {
  const parsed = validateWebSearchConfig(config);
  return new SpecializedSearchMiddleware(search ?? createCachedSearch(parsed, logger), {
    devToolName: parsed.devToolName,
    locationToolName: parsed.locationToolName,
    factCheckToolName: parsed.factCheckToolName,
    logger,
  });
}
