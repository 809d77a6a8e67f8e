/**
 * DuckDuckGo Lite provider: scrapes the keyless HTML endpoint.
 */

import { createLogger } from "@sift/core";
import { fetchText } from "../fetch-text.js";
import { type HtmlDocument, parseDocument, selectAll, textOf } from "../html.js";
import {
  DEFAULT_MAX_SNIPPET_LENGTH,
  type SearchBatch,
  type SearchOptions,
  type SearchProviderConfig,
  type SearchResult,
  type TimePeriod,
  type WebSearchProvider,
} from "../types.js";
import { extractDomain, truncateSnippet } from "../utils.js";

const DUCKDUCKGO_LITE_URL = "https://lite.duckduckgo.com/lite/";
const NO_REGION = "wt-wt";

const RELATED_SELECTORS = [
  "tr.result-link--related a",
  "tr.result-link.related a",
  "a.result--more__link",
  "a.related-searches__item",
] as const;

const TIME_FILTER: Record<TimePeriod, string> = {
  day: "d",
  week: "w",
  month: "m",
  year: "y",
};

const log = createLogger("web-search:duckduckgo");

/**
 * Resolve DuckDuckGo redirect links (`/l/?uddg=<target>`) to their target.
 */
export function unwrapRedirect(href: string): string {
  if (!href.includes("uddg=")) return href;
  try {
    const target = new URL(href, "https://duckduckgo.com").searchParams.get("uddg");
    return target !== null && target !== "" ? target : href;
  } catch {
    return href;
  }
}

function toResult(
  title: string,
  href: string,
  description: string,
  maxSnippetLength: number,
): SearchResult {
  const url = unwrapRedirect(href);
  return {
    title,
    url,
    description: truncateSnippet(description, maxSnippetLength),
    domain: extractDomain(url),
  };
}

/**
 * Extract related queries; exact repeats are dropped here, case-insensitive
 * ones later by the search pipeline.
 */
export function extractRelatedQueries(document: HtmlDocument): string[] {
  const related: string[] = [];
  const seen = new Set<string>();

  for (const selector of RELATED_SELECTORS) {
    for (const anchor of selectAll(document, selector)) {
      const text = textOf(anchor);
      if (text !== "" && !seen.has(text)) {
        related.push(text);
        seen.add(text);
      }
    }
  }

  if (related.length === 0) {
    for (const anchor of selectAll(document, "table.related-searches a")) {
      const text = textOf(anchor);
      if (text !== "") related.push(text);
    }
  }

  return related;
}

/**
 * Parse a DuckDuckGo Lite results page. Falls back to any absolute link
 * on the page when the result rows are missing.
 */
export function parseLiteResults(
  html: string,
  count: number,
  maxSnippetLength: number = DEFAULT_MAX_SNIPPET_LENGTH,
): SearchBatch {
  const document = parseDocument(html);
  const rows = selectAll(document, "tr.result-link");
  const snippets = selectAll(document, "tr.result-snippet");
  const results: SearchResult[] = [];

  for (const [index, row] of rows.slice(0, count).entries()) {
    const anchor = row.querySelector("a");
    if (anchor === null) continue;
    results.push(
      toResult(
        textOf(anchor),
        anchor.getAttribute("href") ?? "",
        textOf(snippets[index]),
        maxSnippetLength,
      ),
    );
  }

  let total = rows.length;

  if (results.length === 0) {
    const candidates = selectAll(document, "a").filter((link) => {
      const href = link.getAttribute("href") ?? "";
      return href !== "" && !href.startsWith("#") && !href.startsWith("/");
    });
    log.debug(`no result rows; falling back to ${candidates.length} page links`);

    for (const link of candidates.slice(0, count)) {
      const title = textOf(link);
      const parentText = textOf(link.parentElement);
      const description = parentText.length > title.length ? parentText : "";
      results.push(toResult(title, link.getAttribute("href") ?? "", description, maxSnippetLength));
    }
    total = candidates.length;
  }

  return { results, total, relatedSearches: extractRelatedQueries(document) };
}

export function createDuckDuckGoLiteProvider(
  config: Omit<SearchProviderConfig, "provider"> = {},
  maxSnippetLength: number = DEFAULT_MAX_SNIPPET_LENGTH,
): WebSearchProvider {
  const baseUrl = config.baseUrl ?? DUCKDUCKGO_LITE_URL;
  const region = config.region ?? NO_REGION;

  return {
    id: "duckduckgo",

    async search(query: string, options: SearchOptions, signal?: AbortSignal): Promise<SearchBatch> {
      const form = new URLSearchParams({ q: query, kl: region, s: String(options.offset) });
      if (options.timePeriod !== undefined) form.set("df", TIME_FILTER[options.timePeriod]);

      const html = await fetchText(
        "duckduckgo",
        baseUrl,
        {
          method: "POST",
          headers: { "Content-Type": "application/x-www-form-urlencoded" },
          body: form.toString(),
        },
        config.timeoutMs,
        signal,
      );

      const batch = parseLiteResults(html, options.count, maxSnippetLength);
      log.debug(`"${query}" → ${batch.results.length} results (${batch.total} on page)`);
      return batch;
    },
  };
}
