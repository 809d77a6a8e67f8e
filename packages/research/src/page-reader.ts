/**
 * Page reader: fetch a result page and pull out the metadata and body
 * text the research workflow summarises.
 */

import { createLogger, type Logger } from "@sift/core";
import { PageFetchError, SearchProviderError, SearchRateLimitedError } from "@sift/errors";
import {
  collapseWhitespace,
  extractDomain,
  fetchText,
  type HtmlDocument,
  type HtmlElement,
  parseDocument,
  selectAll,
} from "@sift/web-search";
import { SnapshotStore } from "./snapshots.js";
import {
  DEFAULT_PAGE_TIMEOUT_MS,
  MAX_CONTENT_LENGTH,
  type PageDetails,
  type PageReader,
  type ReadOptions,
} from "./types.js";

const MAX_HEADINGS = 10;
const MAX_PARAGRAPHS = 10;
const WIKIPEDIA_PARAGRAPHS = 5;
/** Body paragraphs shorter than this are navigation or boilerplate */
const SUBSTANTIAL_PARAGRAPH = 50;
const MAX_TAG_LENGTH = 30;

const CONTAINER_NAMES = ["content", "main", "article", "post", "entry"] as const;
const OFFICIAL_SUFFIXES = [".gov", ".edu", ".org", ".mil"] as const;
const DATE_META = ["article:published_time", "datePublished", "pubdate", "date", "publishdate"] as const;
const AUTHOR_META = ["author", "article:author", "dc.creator", "twitter:creator"] as const;

function text(element: HtmlElement | null | undefined): string {
  return collapseWhitespace(element?.textContent ?? "");
}

function metaContent(doc: HtmlDocument, key: string): string | undefined {
  const selector = `meta[name="${key}"], meta[property="${key}"]`;
  for (const meta of selectAll(doc, selector)) {
    const content = meta.getAttribute("content")?.trim();
    if (content) return content;
  }
  return undefined;
}

function paragraphTexts(root: HtmlDocument | HtmlElement, limit: number, minLength = 1): string[] {
  return selectAll(root, "p")
    .slice(0, limit)
    .map(text)
    .filter((paragraph) => paragraph.length >= minLength);
}

function containerContent(doc: HtmlDocument, marker: "#" | "."): string[] {
  for (const name of CONTAINER_NAMES) {
    const container = doc.querySelector(
      ["div", "article", "main"].map((tag) => `${tag}${marker}${name}`).join(", "),
    );
    if (container === null) continue;
    const parts = paragraphTexts(container, MAX_PARAGRAPHS);
    if (parts.length > 0) return parts;
  }
  return [];
}

function extractContent(doc: HtmlDocument, domain: string): string {
  let parts: string[] = [];
  if (domain.includes("wikipedia.org")) {
    const body = doc.querySelector("#mw-content-text");
    if (body !== null) parts = paragraphTexts(body, WIKIPEDIA_PARAGRAPHS);
  }
  if (parts.length === 0) parts = containerContent(doc, "#");
  if (parts.length === 0) parts = containerContent(doc, ".");
  if (parts.length === 0) {
    const body = doc.querySelector("body");
    if (body !== null) parts = paragraphTexts(body, MAX_PARAGRAPHS, SUBSTANTIAL_PARAGRAPH + 1);
  }

  const content = parts.join(" ");
  return content.length > MAX_CONTENT_LENGTH
    ? `${content.slice(0, MAX_CONTENT_LENGTH)}...`
    : content;
}

function extractDescription(doc: HtmlDocument): string {
  const meta =
    doc.querySelector('meta[name="description"]')?.getAttribute("content")?.trim() ||
    doc.querySelector('meta[property="og:description"]')?.getAttribute("content")?.trim();
  if (meta) return meta;
  return selectAll(doc, "p").map(text).find((p) => p.length > SUBSTANTIAL_PARAGRAPH) ?? "";
}

function extractPublishedDate(doc: HtmlDocument): string | undefined {
  for (const key of DATE_META) {
    const content = metaContent(doc, key);
    if (content !== undefined) return content;
  }
  for (const time of selectAll(doc, "time[datetime]")) {
    const value = time.getAttribute("datetime");
    if (value) return value;
  }
  return undefined;
}

function extractAuthor(doc: HtmlDocument): string | undefined {
  for (const key of AUTHOR_META) {
    const content = metaContent(doc, key);
    if (content !== undefined) return content;
  }
  const byline = doc.querySelector(
    "span.author, div.author, a.author, span.byline, div.byline, a.byline",
  );
  if (byline !== null) return text(byline);
  const link = doc.querySelector('a[rel="author"]');
  return link !== null ? text(link) : undefined;
}

function extractKeywords(doc: HtmlDocument): string[] {
  const keywords = (metaContent(doc, "keywords") ?? "")
    .split(",")
    .map((keyword) => keyword.trim())
    .filter((keyword) => keyword !== "");

  for (const tag of selectAll(doc, 'meta[property="article:tag"]')) {
    const content = tag.getAttribute("content")?.trim();
    if (content) keywords.push(content);
  }

  if (keywords.length === 0) {
    const selector = ["tag", "keyword", "category"]
      .flatMap((name) => [`a.${name}`, `span.${name}`])
      .join(", ");
    for (const element of selectAll(doc, selector)) {
      const value = text(element);
      if (value !== "" && value.length < MAX_TAG_LENGTH) keywords.push(value);
    }
  }
  return keywords;
}

function looksOfficial(doc: HtmlDocument, url: string, domain: string, title: string): boolean {
  if (OFFICIAL_SUFFIXES.some((suffix) => domain.endsWith(suffix))) return true;
  if (url.toLowerCase().includes("official")) return true;
  if (title.toLowerCase().includes("official")) return true;
  return text(doc.querySelector("body")).toLowerCase().includes("verified");
}

/**
 * Extract page details from raw HTML.
 */
export function extractPageDetails(html: string, url: string): PageDetails {
  const doc = parseDocument(html);
  const domain = extractDomain(url);
  const title = text(doc.querySelector("title")) || "No title";
  const headings = selectAll(doc, "h1, h2, h3")
    .map(text)
    .filter((heading) => heading.length > 3)
    .slice(0, MAX_HEADINGS);
  const publishedDate = extractPublishedDate(doc);
  const author = extractAuthor(doc);

  return {
    url,
    domain,
    title,
    description: extractDescription(doc),
    contentSnippet: extractContent(doc, domain),
    headings,
    ...(publishedDate !== undefined ? { publishedDate } : {}),
    ...(author !== undefined ? { author } : {}),
    keywords: extractKeywords(doc),
    isOfficial: looksOfficial(doc, url, domain, title),
  };
}

export interface HttpPageReaderOptions {
  readonly timeoutMs?: number;
  readonly logger?: Logger;
  /** Where `captureSnapshot` reads are recorded; a private store by default */
  readonly snapshots?: SnapshotStore;
}

/**
 * Reads pages over HTTP. Transport failures surface as PageFetchError;
 * an abort from the caller's signal is rethrown unchanged.
 */
export class HttpPageReader implements PageReader {
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  readonly snapshots: SnapshotStore;

  constructor(options: HttpPageReaderOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_PAGE_TIMEOUT_MS;
    this.logger = options.logger ?? createLogger("research");
    this.snapshots = options.snapshots ?? new SnapshotStore();
  }

  async read(url: string, signal?: AbortSignal, options: ReadOptions = {}): Promise<PageDetails> {
    let html: string;
    try {
      html = await fetchText("page-reader", url, { method: "GET" }, this.timeoutMs, signal);
    } catch (error) {
      if (error instanceof SearchProviderError) {
        throw new PageFetchError(url, error.reason, error);
      }
      if (error instanceof SearchRateLimitedError) {
        throw new PageFetchError(url, "rate limited", error);
      }
      throw error;
    }
    this.logger.debug(`read ${html.length} characters from ${url}`);
    const details = extractPageDetails(html, url);
    if (options.captureSnapshot !== true) {
      return details;
    }

    const snapshot = this.snapshots.record({
      url,
      content: html,
      metadata: { title: details.title, domain: details.domain, source: "page-reader" },
    });
    return { ...details, snapshotId: snapshot.id };
  }
}
