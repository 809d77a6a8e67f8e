import type { SearchIntent } from "./types.js";

/** Freshness window per intent, in seconds */
export const INTENT_TTL_SECONDS: Readonly<Record<SearchIntent, number>> = {
  news: 15 * 60,
  technical: 24 * 60 * 60,
  shopping: 6 * 60 * 60,
  academic: 36 * 60 * 60,
  finance: 3 * 60 * 60,
  local: 2 * 60 * 60,
  general: 6 * 60 * 60,
};

function isKnownIntent(intent: string): intent is SearchIntent {
  return Object.hasOwn(INTENT_TTL_SECONDS, intent);
}

/**
 * Resolve the TTL for an intent. Overrides win; unknown intents fall back
 * to the general window.
 */
export function resolveTtl(
  intent: string,
  overrides: Partial<Record<SearchIntent, number>> = {},
): number {
  const known: SearchIntent = isKnownIntent(intent) ? intent : "general";
  return overrides[known] ?? INTENT_TTL_SECONDS[known];
}
