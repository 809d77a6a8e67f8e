import { afterEach, describe, expect, it, vi } from "vitest";
import {
  createDuckDuckGoLiteProvider,
  parseLiteResults,
  unwrapRedirect,
} from "../../providers/duckduckgo-lite.js";

const RESULTS_PAGE = `
<html><body>
<table>
  <tr class="result-link"><td><a href="https://docs.example.com/guide">Example Guide</a></td></tr>
  <tr class="result-snippet"><td>  A guide to examples. </td></tr>
  <tr class="result-link"><td><a href="//duckduckgo.com/l/?uddg=https%3A%2F%2Fblog.test%2Fpost&amp;rut=abc">Blog Post</a></td></tr>
  <tr class="result-snippet"><td>Posted today.</td></tr>
  <tr class="result-link"><td><a href="https://third.org/">Third</a></td></tr>
  <tr class="result-snippet"><td>Third snippet</td></tr>
</table>
<table class="related-searches">
  <tr><td><a href="/?q=a">example tutorial</a></td></tr>
  <tr><td><a href="/?q=b">Example Tutorial</a></td></tr>
</table>
</body></html>`;

const FALLBACK_PAGE = `
<html><body><div>
  <p><a href="https://alpha.dev/x">Alpha</a> - the alpha project</p>
  <a href="#top">Top</a>
  <a href="/settings">Settings</a>
  <p><a href="https://beta.dev/">Beta</a></p>
</div></body></html>`;

describe("unwrapRedirect", () => {
  it("should decode the uddg target of a redirect link", () => {
    expect(unwrapRedirect("//duckduckgo.com/l/?uddg=https%3A%2F%2Fblog.test%2Fpost&rut=abc")).toBe(
      "https://blog.test/post",
    );
  });

  it("should return direct links unchanged", () => {
    expect(unwrapRedirect("https://example.com/a")).toBe("https://example.com/a");
  });
});

describe("parseLiteResults", () => {
  it("should read result rows with their snippets up to count", () => {
    const batch = parseLiteResults(RESULTS_PAGE, 2);

    expect(batch.results).toEqual([
      {
        title: "Example Guide",
        url: "https://docs.example.com/guide",
        description: "A guide to examples.",
        domain: "docs.example.com",
      },
      {
        title: "Blog Post",
        url: "https://blog.test/post",
        description: "Posted today.",
        domain: "blog.test",
      },
    ]);
    expect(batch.total).toBe(3);
  });

  it("should collect related searches from the fallback table", () => {
    expect(parseLiteResults(RESULTS_PAGE, 10).relatedSearches).toEqual([
      "example tutorial",
      "Example Tutorial",
    ]);
  });

  it("should truncate long snippets", () => {
    const batch = parseLiteResults(RESULTS_PAGE, 1, 10);
    expect(batch.results[0]?.description).toBe("A guide...");
  });

  it("should fall back to absolute page links when result rows are missing", () => {
    const batch = parseLiteResults(FALLBACK_PAGE, 5);

    expect(batch.results).toEqual([
      {
        title: "Alpha",
        url: "https://alpha.dev/x",
        description: "Alpha - the alpha project",
        domain: "alpha.dev",
      },
      { title: "Beta", url: "https://beta.dev/", description: "", domain: "beta.dev" },
    ]);
    expect(batch.total).toBe(2);
    expect(batch.relatedSearches).toEqual([]);
  });

  it("should return an empty batch for a page without links", () => {
    expect(parseLiteResults("<html><body><p>nothing</p></body></html>", 5)).toEqual({
      results: [],
      total: 0,
      relatedSearches: [],
    });
  });
});

describe("createDuckDuckGoLiteProvider", () => {
  const originalFetch = globalThis.fetch;

  afterEach(() => {
    globalThis.fetch = originalFetch;
  });

  it("should post the query form and parse the page", async () => {
    const fetchMock = vi.fn().mockResolvedValue({
      ok: true,
      status: 200,
      text: () => Promise.resolve(RESULTS_PAGE),
    });
    globalThis.fetch = fetchMock;

    const provider = createDuckDuckGoLiteProvider({ baseUrl: "https://lite.example.test/" });
    const batch = await provider.search("rust async", { count: 1, offset: 10, timePeriod: "week" });

    expect(provider.id).toBe("duckduckgo");
    expect(fetchMock).toHaveBeenCalledWith(
      "https://lite.example.test/",
      expect.objectContaining({ method: "POST", body: "q=rust+async&kl=wt-wt&s=10&df=w" }),
    );
    expect(batch.results.map((r) => r.title)).toEqual(["Example Guide"]);
  });

  it("should use the configured region", async () => {
    const fetchMock = vi.fn().mockResolvedValue({
      ok: true,
      status: 200,
      text: () => Promise.resolve("<html><body></body></html>"),
    });
    globalThis.fetch = fetchMock;

    await createDuckDuckGoLiteProvider({ region: "de-de" }).search("bier", { count: 5, offset: 0 });

    expect(fetchMock).toHaveBeenCalledWith(
      "https://lite.duckduckgo.com/lite/",
      expect.objectContaining({ body: "q=bier&kl=de-de&s=0" }),
    );
  });
});
