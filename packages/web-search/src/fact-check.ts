/**
 * Keyword fact checking: search a statement under several phrasings and
 * tally how the sources found lean.
 */

import type { CachedSearch } from "./cached-search.js";
import type { FactCheckReport, FactCheckSource, Sentiment, Verdict } from "./types.js";

const SUPPORTING_TERMS = [
  "confirm",
  "true",
  "verified",
  "evidence supports",
  "proven",
  "accurate",
  "correct",
];

const CONTRADICTING_TERMS = [
  "false",
  "fake",
  "hoax",
  "debunk",
  "myth",
  "incorrect",
  "no evidence",
  "wrong",
];

/** Results requested per phrasing */
const RESULTS_PER_QUERY = 5;

/** Phrasings searched in order until enough sources are collected */
export function factCheckQueries(statement: string): string[] {
  return [
    `${statement} fact check`,
    `is it true that ${statement}`,
    `${statement} debunked`,
    `${statement} evidence`,
    `is ${statement} accurate`,
  ];
}

function countTerms(terms: readonly string[], title: string, description: string): number {
  return terms.filter((term) => title.includes(term) || description.includes(term)).length;
}

/** Whichever term list matches more of the title and description wins. */
export function classifySentiment(title: string, description: string): Sentiment {
  const loweredTitle = title.toLowerCase();
  const loweredDescription = description.toLowerCase();
  const supporting = countTerms(SUPPORTING_TERMS, loweredTitle, loweredDescription);
  const contradicting = countTerms(CONTRADICTING_TERMS, loweredTitle, loweredDescription);
  if (supporting > contradicting) return "supporting";
  if (contradicting > supporting) return "contradicting";
  return "neutral";
}

/**
 * Score in [-100, 100]: (supporting - contradicting) over the source
 * count with neutral sources weighted by half, truncated toward zero.
 */
export function scoreFactCheck(supporting: number, contradicting: number, neutral: number): number {
  const total = supporting + contradicting + neutral * 0.5;
  if (total === 0) return 0;
  const score = Math.trunc(((supporting - contradicting) / total) * 100);
  return Math.max(-100, Math.min(100, score));
}

export function verdictFor(score: number): Verdict {
  if (score >= 70) return "Likely True";
  if (score >= 30) return "Possibly True";
  if (score <= -70) return "Likely False";
  if (score <= -30) return "Possibly False";
  return "Inconclusive";
}

/**
 * Collect up to `minSources * 2` distinct sources (by URL) across the
 * phrasings of `statement`, then score them. Search failures propagate.
 */
export async function factCheck(
  search: CachedSearch,
  statement: string,
  minSources: number,
  signal?: AbortSignal,
): Promise<FactCheckReport> {
  const limit = minSources * 2;
  const sources: FactCheckSource[] = [];
  const seen = new Set<string>();

  for (const query of factCheckQueries(statement)) {
    if (sources.length >= limit) break;

    const payload = await search.search(
      { query, count: RESULTS_PER_QUERY, offset: 0, page: 1, getRelated: false },
      signal,
    );
    for (const result of payload.results) {
      if (seen.has(result.url)) continue;
      seen.add(result.url);
      sources.push({
        url: result.url,
        title: result.title,
        description: result.description,
        sentiment: classifySentiment(result.title, result.description),
      });
      if (sources.length >= limit) break;
    }
  }

  const tally = (sentiment: Sentiment) =>
    sources.filter((source) => source.sentiment === sentiment).length;
  const supportingSources = tally("supporting");
  const contradictingSources = tally("contradicting");
  const neutralSources = tally("neutral");
  const confidenceScore = scoreFactCheck(supportingSources, contradictingSources, neutralSources);

  return {
    statement,
    verdict: verdictFor(confidenceScore),
    confidenceScore,
    supportingSources,
    contradictingSources,
    neutralSources,
    sources,
  };
}
