/**
 * Heuristic query intent detection.
 *
 * Keyword phrases score 2, hint tokens 1 each, plus small nudges for
 * `site:` GitHub queries (technical) and four-digit years (news).
 * Ties go to the earlier intent in SEARCH_INTENTS.
 */

import { SEARCH_INTENTS, type SearchIntent } from "@sift/semantic-cache";
import { INTENT_LEXICON, type IntentLexicon } from "./lexicon.js";
import type { IntentClassification } from "./types.js";

const PHRASE_WEIGHT = 2;
const CONFIDENCE_SCALE = 4;

function tokenize(query: string): string[] {
  return query.toLowerCase().match(/[\p{L}\p{N}_']+/gu) ?? [];
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function classifyIntent(
  query: string,
  lexicon: IntentLexicon = INTENT_LEXICON,
): IntentClassification {
  const tokens = tokenize(query);
  if (tokens.length === 0) {
    return { intent: "general", confidence: 0 };
  }

  const joined = tokens.join(" ");
  const tokenSet = new Set(tokens);
  const scores = new Map<SearchIntent, number>();
  const bump = (intent: SearchIntent, by: number) => scores.set(intent, (scores.get(intent) ?? 0) + by);

  for (const [intent, phrases] of Object.entries(lexicon.keywords)) {
    if (!isIntent(intent)) continue;
    for (const phrase of phrases) {
      if (joined.includes(phrase)) bump(intent, PHRASE_WEIGHT);
    }
  }

  for (const [intent, hints] of Object.entries(lexicon.hints)) {
    if (!isIntent(intent)) continue;
    const overlap = hints.filter((hint) => tokenSet.has(hint)).length;
    if (overlap > 0) bump(intent, overlap);
  }

  const lowered = query.toLowerCase();
  if (lowered.includes("site:") && lowered.includes("github")) bump("technical", 1);
  if (tokens.some((token) => /^\d{4}$/.test(token))) bump("news", 0.5);

  let best: SearchIntent | undefined;
  let bestScore = 0;
  for (const intent of SEARCH_INTENTS) {
    const score = scores.get(intent) ?? 0;
    if (score > bestScore) {
      best = intent;
      bestScore = score;
    }
  }

  if (best === undefined) {
    return { intent: "general", confidence: 0 };
  }
  return { intent: best, confidence: round2(Math.min(1, bestScore / CONFIDENCE_SCALE)) };
}

function isIntent(value: string): value is SearchIntent {
  return SEARCH_INTENTS.some((intent) => intent === value);
}
