import { silentLogger, type ToolRequest, type ToolResponse } from "@sift/core";
import { ConfigInvalidError, ValidationError } from "@sift/errors";
import { FingerprintCache } from "@sift/semantic-cache";
import { describe, expect, it, vi } from "vitest";
import { CachedSearch } from "../cached-search.js";
import {
  buildQuery,
  createSearchMiddleware,
  paginate,
  SearchMiddleware,
  type SearchMiddlewareOptions,
} from "../middleware.js";
import type { SearchBatch, SearchPayload, SearchRequest, SearchResponse } from "../types.js";

const RESULTS = [
  { title: "One", url: "https://one.test/", description: "first", domain: "one.test" },
  { title: "Two", url: "https://two.test/", description: "second", domain: "two.test" },
];

function setup(batch: SearchBatch, options: SearchMiddlewareOptions = {}) {
  const fetch = vi.fn(async (_request: SearchRequest): Promise<SearchBatch> => batch);
  const search = new CachedSearch({
    backend: { fetch },
    cache: new FingerprintCache<SearchPayload>(),
    logger: silentLogger,
  });
  const middleware = new SearchMiddleware(search, { logger: silentLogger, ...options });
  return { middleware, fetch };
}

function isSearchResponse(value: unknown): value is SearchResponse {
  return typeof value === "object" && value !== null && "results" in value && "totalPages" in value;
}

describe("buildQuery", () => {
  it("should append site and date operators", () => {
    expect(buildQuery("zzz", "example.com", "month")).toBe("zzz site:example.com date:m");
  });

  it("should keep an explicit site operator", () => {
    expect(buildQuery("zzz site:a.test", "b.test")).toBe("zzz site:a.test");
  });

  it("should return the query untouched without options", () => {
    expect(buildQuery("zzz")).toBe("zzz");
  });
});

describe("paginate", () => {
  it("should compute page flags", () => {
    expect(paginate(25, 10, 1)).toEqual({ totalPages: 3, hasNext: true, hasPrevious: false });
    expect(paginate(25, 10, 3)).toEqual({ totalPages: 3, hasNext: false, hasPrevious: true });
  });

  it("should report a single page when nothing was found", () => {
    expect(paginate(0, 10, 1)).toEqual({ totalPages: 1, hasNext: false, hasPrevious: false });
  });
});

describe("SearchMiddleware", () => {
  it("should answer web_search with a paged response", async () => {
    const { middleware, fetch } = setup({ results: RESULTS, total: 5, relatedSearches: [] });
    const next = vi.fn();
    const req: ToolRequest = {
      toolName: "web_search",
      input: { query: "zzz", count: 2, page: 2, site: "example.com", timePeriod: "week" },
    };

    const response = await middleware.wrapToolCall(req, next);

    expect(next).not.toHaveBeenCalled();
    expect(fetch).toHaveBeenCalledWith(
      {
        query: "zzz site:example.com date:w",
        count: 2,
        offset: 2,
        page: 2,
        site: "example.com",
        timePeriod: "week",
        intent: "general",
        getRelated: false,
      },
      undefined,
    );
    expect(response.output).toEqual({
      results: RESULTS,
      totalResults: 5,
      page: 2,
      totalPages: 3,
      hasNext: true,
      hasPrevious: true,
      intent: "general",
      intentConfidence: 0,
      cache: { status: "miss", ageSeconds: 0 },
    });
    expect(response.metadata).toEqual({
      provider: "web-search",
      resultCount: 2,
      cacheStatus: "miss",
    });
  });

  it("should serve a repeated call from cache", async () => {
    const { middleware, fetch } = setup({ results: RESULTS, total: 2, relatedSearches: [] });
    const req: ToolRequest = { toolName: "web_search", input: { query: "zzz" } };

    await middleware.wrapToolCall(req, vi.fn());
    const second = await middleware.wrapToolCall(req, vi.fn());

    expect(fetch).toHaveBeenCalledTimes(1);
    expect(second.metadata).toEqual({ provider: "web-search", resultCount: 2, cacheStatus: "hit" });
    if (!isSearchResponse(second.output)) throw new Error("expected a search response");
    expect(second.output.cache.status).toBe("hit");
  });

  it("should reject an empty query before searching", async () => {
    const { middleware, fetch } = setup({ results: [], total: 0, relatedSearches: [] });
    const req: ToolRequest = { toolName: "web_search", input: { query: "   " } };

    const call = middleware.wrapToolCall(req, vi.fn());

    await expect(call).rejects.toThrow(ValidationError);
    await expect(call).rejects.toThrow("Invalid web_search input: query: query must not be empty");
    expect(fetch).not.toHaveBeenCalled();
  });

  it("should answer related_searches with deduplicated suggestions", async () => {
    const { middleware, fetch } = setup({
      results: RESULTS,
      total: 2,
      relatedSearches: ["A", "a", " b ", "c", "d"],
    });

    const response = await middleware.wrapToolCall(
      { toolName: "related_searches", input: { query: "zzz", count: 3 } },
      vi.fn(),
    );

    expect(response.output).toEqual(["A", "b", "c"]);
    expect(response.metadata).toEqual({ provider: "web-search", resultCount: 3, cacheStatus: "miss" });
    expect(fetch).toHaveBeenCalledWith(
      { query: "zzz", count: 3, offset: 0, page: 1, getRelated: true },
      undefined,
    );
  });

  it("should propagate backend failures from related_searches", async () => {
    const search = new CachedSearch({
      backend: { fetch: vi.fn().mockRejectedValue(new Error("offline")) },
      cache: new FingerprintCache<SearchPayload>(),
      logger: silentLogger,
    });
    const middleware = new SearchMiddleware(search, { logger: silentLogger });

    await expect(
      middleware.wrapToolCall({ toolName: "related_searches", input: { query: "zzz" } }, vi.fn()),
    ).rejects.toThrow("offline");
  });

  it("should pass through other tool calls", async () => {
    const { middleware, fetch } = setup({ results: [], total: 0, relatedSearches: [] });
    const req: ToolRequest = { toolName: "other_tool", input: { data: "something" } };
    const expected: ToolResponse = { output: "other result" };
    const next = vi.fn().mockResolvedValue(expected);

    const response = await middleware.wrapToolCall(req, next);

    expect(next).toHaveBeenCalledWith(req);
    expect(response).toBe(expected);
    expect(fetch).not.toHaveBeenCalled();
  });

  it("should claim custom tool names only", async () => {
    const { middleware } = setup(
      { results: RESULTS, total: 2, relatedSearches: [] },
      { toolName: "find", relatedToolName: "suggest" },
    );
    const next = vi.fn().mockResolvedValue({ output: "passed" });

    const claimed = await middleware.wrapToolCall({ toolName: "find", input: { query: "zzz" } }, next);
    const passed = await middleware.wrapToolCall(
      { toolName: "web_search", input: { query: "zzz" } },
      next,
    );

    expect(claimed.metadata).toEqual({ provider: "web-search", resultCount: 2, cacheStatus: "miss" });
    expect(passed.output).toBe("passed");
    expect(next).toHaveBeenCalledTimes(1);
  });
});

describe("createSearchMiddleware", () => {
  it("should build a middleware from defaults", () => {
    const middleware = createSearchMiddleware({}, silentLogger);

    expect(middleware.name).toBe("web-search");
  });

  it("should reject invalid configuration", () => {
    expect(() => createSearchMiddleware({ maxSnippetLength: 10 }, silentLogger)).toThrow(
      ConfigInvalidError,
    );
    expect(() => createSearchMiddleware({ maxSnippetLength: 10 }, silentLogger)).toThrow(
      "Invalid web-search configuration: maxSnippetLength: Number must be greater than or equal to 50",
    );
  });
});
