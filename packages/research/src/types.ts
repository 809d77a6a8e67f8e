import type { OrchestrationResult } from "@sift/orchestration";
import type { SearchPayload, SearchRequest } from "@sift/web-search";

// ---------------------------------------------------------------------------
// Page reading
// ---------------------------------------------------------------------------

/** Metadata and content extracted from one fetched page */
export interface PageDetails {
  readonly url: string;
  readonly domain: string;
  readonly title: string;
  readonly description: string;
  readonly contentSnippet: string;
  readonly headings: readonly string[];
  readonly publishedDate?: string;
  readonly author?: string;
  readonly keywords: readonly string[];
  /** Government, education or otherwise self-declared official source */
  readonly isOfficial: boolean;
  /** Set when the read captured a snapshot of the raw page */
  readonly snapshotId?: string;
}

export interface ReadOptions {
  readonly captureSnapshot?: boolean;
}

export interface PageReader {
  read(url: string, signal?: AbortSignal, options?: ReadOptions): Promise<PageDetails>;
}

// ---------------------------------------------------------------------------
// Summaries
// ---------------------------------------------------------------------------

export interface PageSummary {
  readonly url: string;
  readonly title: string;
  readonly summary: string;
  readonly keyPoints: readonly string[];
  readonly wordCount: number;
  readonly contentLength: number;
  /** First three headings of the page */
  readonly headings: readonly string[];
  readonly domain: string;
}

// ---------------------------------------------------------------------------
// Workflow
// ---------------------------------------------------------------------------

/** Anything that answers search requests; CachedSearch in production */
export interface SearchService {
  search(request: SearchRequest, signal?: AbortSignal): Promise<SearchPayload>;
}

/** Context handed to every research hop */
export interface ResearchContext {
  readonly signal?: AbortSignal;
}

export interface ResearchReport {
  readonly query: string;
  readonly search: SearchPayload | undefined;
  readonly details: readonly PageDetails[];
  readonly summaries: readonly PageSummary[];
  /** Ids of the snapshots captured while reading pages */
  readonly snapshots: readonly string[];
  readonly trace: OrchestrationResult["trace"];
}

export const DEFAULT_RESEARCH_TOOL_NAME = "multi_hop_research";
export const DEFAULT_DETAILS_TOOL_NAME = "get_page_details";
export const DEFAULT_SUMMARIZE_TOOL_NAME = "summarize_webpage";
export const DEFAULT_PAGE_TIMEOUT_MS = 10_000;
/** Pages keep at most this many characters of extracted content */
export const MAX_CONTENT_LENGTH = 2000;
