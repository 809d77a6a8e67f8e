import { type Clock, silentLogger } from "@sift/core";
import { FingerprintCache } from "@sift/semantic-cache";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { CachedSearch, estimateTotal } from "../cached-search.js";
import type {
  SearchBackend,
  SearchBatch,
  SearchPayload,
  SearchRequest,
  SearchResult,
} from "../types.js";

function createClock(): Clock & { advance(ms: number): void } {
  let current = 0;
  return {
    now: () => current,
    advance(ms: number) {
      current += ms;
    },
  };
}

function result(name: string, title = name.toUpperCase()): SearchResult {
  return { title, url: `https://${name}.test/`, description: "", domain: `${name}.test` };
}

function batchOf(results: SearchResult[], relatedSearches: string[] = [], total = results.length): SearchBatch {
  return { results, total, relatedSearches };
}

function createBackend(...batches: SearchBatch[]) {
  const queue = [...batches];
  const fetch = vi.fn(async (_request: SearchRequest): Promise<SearchBatch> => {
    return queue.shift() ?? batchOf([]);
  });
  const backend: SearchBackend = { fetch };
  return { backend, fetch };
}

function request(overrides: Partial<SearchRequest> = {}): SearchRequest {
  return {
    query: "zzz",
    count: 2,
    offset: 0,
    page: 1,
    intent: "news",
    getRelated: false,
    ...overrides,
  };
}

describe("CachedSearch", () => {
  let clock: ReturnType<typeof createClock>;
  let cache: FingerprintCache<SearchPayload>;

  beforeEach(() => {
    clock = createClock();
    cache = new FingerprintCache<SearchPayload>({ clock });
  });

  function createSearch(backend: SearchBackend): CachedSearch {
    return new CachedSearch({ backend, cache, logger: silentLogger });
  }

  it("should fetch on a miss and serve the repeat from cache", async () => {
    const { backend, fetch } = createBackend(batchOf([result("a"), result("b")]));
    const search = createSearch(backend);

    const first = await search.search(request());
    clock.advance(30_000);
    const second = await search.search(request());

    expect(first.cacheMetadata).toEqual({ status: "miss", ageSeconds: 0 });
    expect(second.cacheMetadata).toEqual({ status: "hit", ageSeconds: 30 });
    expect(second.results).toEqual(first.results);
    expect(second.intent).toBe("news");
    expect(fetch).toHaveBeenCalledTimes(1);
  });

  it("should treat a differently-cased query as the same search", async () => {
    const { backend, fetch } = createBackend(batchOf([result("a")]));
    const search = createSearch(backend);

    await search.search(request({ query: "Rust Async" }));
    const again = await search.search(request({ query: "rust async" }));

    expect(again.cacheMetadata.status).toBe("hit");
    expect(fetch).toHaveBeenCalledTimes(1);
  });

  it("should fetch separately for a different page", async () => {
    const { backend, fetch } = createBackend(batchOf([result("a")]), batchOf([result("b")]));
    const search = createSearch(backend);

    await search.search(request());
    const pageTwo = await search.search(request({ page: 2, offset: 2 }));

    expect(pageTwo.cacheMetadata.status).toBe("miss");
    expect(pageTwo.results).toEqual([result("b")]);
    expect(fetch).toHaveBeenCalledTimes(2);
  });

  it("should default the intent to general", async () => {
    const { backend } = createBackend(batchOf([result("a")]));
    const payload = await createSearch(backend).search(request({ intent: undefined }));

    expect(payload.intent).toBe("general");
  });

  describe("refresh of a stale entry", () => {
    it("should put fresh results first and append unseen cached ones", async () => {
      const { backend, fetch } = createBackend(
        batchOf([result("a"), result("b")]),
        batchOf([result("b", "B again"), result("c")]),
      );
      const search = createSearch(backend);

      await search.search(request());
      clock.advance(901_000);
      const refreshed = await search.search(request());

      expect(refreshed.cacheMetadata).toEqual({ status: "refresh", ageSeconds: 901 });
      expect(refreshed.results).toEqual([result("b", "B again"), result("c"), result("a")]);
      expect(fetch).toHaveBeenCalledTimes(2);
    });

    it("should keep cached results when the fresh fetch comes back empty", async () => {
      const { backend } = createBackend(batchOf([result("a")]), batchOf([]));
      const search = createSearch(backend);

      await search.search(request());
      clock.advance(901_000);
      const refreshed = await search.search(request());

      expect(refreshed.results).toEqual([result("a")]);
    });

    it("should store the merged payload for later hits", async () => {
      const { backend, fetch } = createBackend(batchOf([result("a")]), batchOf([result("c")]));
      const search = createSearch(backend);

      await search.search(request());
      clock.advance(901_000);
      await search.search(request());
      clock.advance(1_000);
      const hit = await search.search(request());

      expect(hit.cacheMetadata).toEqual({ status: "hit", ageSeconds: 1 });
      expect(hit.results).toEqual([result("c"), result("a")]);
      expect(fetch).toHaveBeenCalledTimes(2);
    });
  });

  describe("related searches", () => {
    it("should dedupe case-insensitively up to the request count", async () => {
      const { backend, fetch } = createBackend(
        batchOf([result("a")], ["Rust book", "rust BOOK", " tokio ", "", "axum", "serde"]),
      );

      const payload = await createSearch(backend).search(request({ count: 3, getRelated: true }));

      expect(payload.relatedSearches).toEqual(["Rust book", "tokio", "axum"]);
      expect(fetch).toHaveBeenCalledTimes(1);
    });

    it("should honor an explicit related count", async () => {
      const { backend } = createBackend(batchOf([result("a")], ["one", "two", "three"]));

      const payload = await createSearch(backend).search(
        request({ getRelated: true, relatedCount: 1 }),
      );

      expect(payload.relatedSearches).toEqual(["one"]);
    });

    it("should reuse stale related searches when the refresh has none", async () => {
      const { backend } = createBackend(batchOf([result("a")], ["kept"]), batchOf([result("b")]));
      const search = createSearch(backend);

      await search.search(request({ getRelated: true }));
      clock.advance(901_000);
      const refreshed = await search.search(request({ getRelated: true }));

      expect(refreshed.relatedSearches).toEqual(["kept"]);
    });

    it("should omit related searches unless requested", async () => {
      const { backend } = createBackend(batchOf([result("a")], ["ignored"]));
      const payload = await createSearch(backend).search(request());

      expect(payload.relatedSearches).toBeUndefined();
    });
  });

  it("should force a refetch after domain invalidation", async () => {
    const { backend, fetch } = createBackend(batchOf([result("a")]), batchOf([result("b")]));
    const search = createSearch(backend);

    await search.search(request());
    expect(search.markDomainStale("A.TEST")).toBe(1);
    const after = await search.search(request());

    expect(after.cacheMetadata).toEqual({ status: "miss", ageSeconds: 0 });
    expect(fetch).toHaveBeenCalledTimes(2);
  });

  it("should propagate backend failures without caching anything", async () => {
    const backend: SearchBackend = {
      fetch: vi.fn().mockRejectedValue(new Error("backend down")),
    };

    await expect(createSearch(backend).search(request())).rejects.toThrow("backend down");
    expect(cache.size).toBe(0);
  });

  it("should not let callers mutate the cached payload", async () => {
    const { backend } = createBackend(batchOf([result("a")]));
    const search = createSearch(backend);

    const first = await search.search(request());
    Object.assign(first, { totalResults: -1 });
    const second = await search.search(request());

    expect(second.totalResults).toBe(1);
    expect(second.results).toHaveLength(1);
  });
});

describe("estimateTotal", () => {
  it("should use the provider count when it is larger", () => {
    expect(estimateTotal(batchOf([result("a"), result("b")], [], 5), request())).toBe(5);
  });

  it("should assume one more result beyond a full page", () => {
    expect(estimateTotal(batchOf([result("a"), result("b")], [], 2), request({ offset: 4 }))).toBe(7);
  });

  it("should count only what was returned for a short page", () => {
    expect(estimateTotal(batchOf([result("a")], [], 1), request({ offset: 4 }))).toBe(5);
  });
});
