/**
 * Shared utilities for web search providers.
 */

import type { SearchResult } from "./types.js";

/**
 * Truncate a snippet to a maximum length, appending "..." if truncated.
 */
export function truncateSnippet(snippet: string, maxLength: number): string {
  if (snippet.length <= maxLength) return snippet;
  return `${snippet.slice(0, maxLength - 3)}...`;
}

/**
 * Host part of a URL (with port, if any), or "" when the URL cannot be parsed.
 */
export function extractDomain(url: string): string {
  try {
    return new URL(url).host;
  } catch {
    return "";
  }
}

/**
 * Collapse runs of whitespace and trim.
 */
export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/**
 * Concatenate result lists and drop repeated URLs; the first occurrence wins.
 * Results without a URL are dropped.
 */
export function mergeResults(
  primary: readonly SearchResult[],
  secondary: readonly SearchResult[],
): SearchResult[] {
  const seen = new Set<string>();
  const merged: SearchResult[] = [];
  for (const result of [...primary, ...secondary]) {
    if (result.url === "" || seen.has(result.url)) continue;
    seen.add(result.url);
    merged.push(result);
  }
  return merged;
}

/**
 * Trim, drop empties and drop case-insensitive repeats, keeping at most `max`.
 */
export function dedupeQueries(candidates: readonly string[], max: number): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const candidate of candidates) {
    if (out.length >= max) break;
    const normalized = candidate.trim();
    if (normalized === "") continue;
    const lowered = normalized.toLowerCase();
    if (seen.has(lowered)) continue;
    seen.add(lowered);
    out.push(normalized);
  }
  return out;
}
