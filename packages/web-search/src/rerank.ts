/**
 * Lightweight lexical reranking: token overlap, bag-of-words cosine and an
 * intent-specific domain boost.
 */

import type { SearchIntent } from "@sift/semantic-cache";
import { INTENT_LEXICON } from "./lexicon.js";
import type { SearchResult } from "./types.js";

const OVERLAP_WEIGHT = 0.6;
const COSINE_WEIGHT = 0.4;
const DOMAIN_BOOST = 0.15;

type TokenCounts = ReadonlyMap<string, number>;

/** NFKD-normalised, lower-cased alphanumeric runs */
export function tokenize(text: string): string[] {
  return text.normalize("NFKD").toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];
}

function countTokens(tokens: readonly string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const token of tokens) counts.set(token, (counts.get(token) ?? 0) + 1);
  return counts;
}

function magnitude(counts: TokenCounts): number {
  let sum = 0;
  for (const value of counts.values()) sum += value * value;
  return Math.sqrt(sum) || 1;
}

export function scoreResult(
  query: TokenCounts,
  document: TokenCounts,
  intent: SearchIntent,
  domain: string,
): number {
  let intersection = 0;
  let dot = 0;
  let queryTotal = 0;
  for (const [token, count] of query) {
    const other = document.get(token) ?? 0;
    intersection += Math.min(count, other);
    dot += count * other;
    queryTotal += count;
  }

  const overlap = intersection / Math.max(1, queryTotal);
  const cosine = dot / (magnitude(query) * magnitude(document));

  const fragments = INTENT_LEXICON.domainBoosts[intent];
  const lowered = domain.toLowerCase();
  const boost = fragments.some((fragment) => lowered.includes(fragment)) ? DOMAIN_BOOST : 0;

  return overlap * OVERLAP_WEIGHT + cosine * COSINE_WEIGHT + boost;
}

/**
 * Order results by descending score; equal scores keep their input order.
 */
export function rerankResults(
  query: string,
  results: readonly SearchResult[],
  intent: SearchIntent,
): SearchResult[] {
  const queryCounts = countTokens(tokenize(query));
  if (queryCounts.size === 0) return [...results];

  return results
    .map((result, index) => ({
      result,
      index,
      score: scoreResult(
        queryCounts,
        countTokens([...tokenize(result.title), ...tokenize(result.description)]),
        intent,
        result.domain,
      ),
    }))
    .sort((a, b) => b.score - a.score || a.index - b.index)
    .map(({ result }) => result);
}
