/**
 * Query shaping and result filtering for the developer and location
 * search tools.
 */

import type { SearchResult } from "./types.js";
import { buildQuery } from "./middleware.js";

/** Sites whose results the developer search lists first */
export const TECHNICAL_SITES = [
  "stackoverflow.com",
  "github.com",
  "docs.python.org",
  "developer.mozilla.org",
  "docs.microsoft.com",
  "reactjs.org",
  "vuejs.org",
  "angular.io",
  "djangoproject.com",
  "laravel.com",
  "nodejs.org",
  "npmjs.com",
  "pypi.org",
] as const;

/** Location words this short are too ambiguous to filter on */
const MIN_LOCATION_TERM_LENGTH = 4;

/**
 * Append language and framework to a developer query, then the `site:`
 * operator when one is given.
 */
export function buildDevQuery(
  query: string,
  language?: string,
  framework?: string,
  site?: string,
): string {
  const terms = [query, language, framework].filter((term): term is string => term !== undefined);
  return buildQuery(terms.join(" "), site);
}

function isTechnicalDomain(domain: string): boolean {
  const lowered = domain.toLowerCase();
  return TECHNICAL_SITES.some((site) => lowered === site || lowered.endsWith(`.${site}`));
}

/**
 * Results from known technical sites first, each group in its original
 * order, cut to `count`.
 */
export function prioritizeTechnical(results: readonly SearchResult[], count: number): SearchResult[] {
  const technical = results.filter((result) => isTechnicalDomain(result.domain));
  const other = results.filter((result) => !isTechnicalDomain(result.domain));
  return [...technical, ...other].slice(0, count);
}

/** e.g. "coffee cafes in Lisbon within 5 km" */
export function buildLocationQuery(
  query: string,
  location: string,
  serviceType?: string,
  radiusKm?: number,
): string {
  let built = `${query} in ${location}`;
  if (serviceType !== undefined) built = `${serviceType} ${built}`;
  if (radiusKm !== undefined) built = `${built} within ${radiusKm} km`;
  return built;
}

/**
 * Keep results whose title or description mentions one of the location's
 * words of four or more letters. A location with no such word keeps
 * everything.
 */
export function filterByLocation(
  results: readonly SearchResult[],
  location: string,
  count: number,
): SearchResult[] {
  const terms = location
    .toLowerCase()
    .split(/\s+/)
    .filter((term) => term.length >= MIN_LOCATION_TERM_LENGTH);
  const matching =
    terms.length === 0
      ? results
      : results.filter((result) => {
          const text = `${result.title} ${result.description}`.toLowerCase();
          return terms.some((term) => text.includes(term));
        });
  return matching.slice(0, count);
}
