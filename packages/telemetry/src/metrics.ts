/**
 * OTel metrics for search and orchestration.
 *
 * Lazily initialized: instruments are only created on first access.
 * When no meter provider is registered, these return no-op instruments.
 */

import type { Counter, Histogram } from "@opentelemetry/api";
import { metrics } from "@opentelemetry/api";

const METER_NAME = "sift";

/** Outcome of a cache-backed search */
export type CacheAccessStatus = "hit" | "miss" | "refresh";

let _cacheAccess: Counter | undefined;
let _cacheInvalidations: Counter | undefined;
let _hopDuration: Histogram | undefined;

/**
 * Get the counter for semantic cache lookups, labelled by status and intent.
 */
export function getCacheAccess(): Counter {
  if (_cacheAccess === undefined) {
    _cacheAccess = metrics.getMeter(METER_NAME).createCounter("sift.search.cache_access", {
      description: "Search requests by cache outcome",
    });
  }
  return _cacheAccess;
}

/**
 * Get the counter for entries removed by domain invalidation.
 */
export function getCacheInvalidations(): Counter {
  if (_cacheInvalidations === undefined) {
    _cacheInvalidations = metrics
      .getMeter(METER_NAME)
      .createCounter("sift.search.cache_invalidations", {
        description: "Cache entries removed by domain staleness invalidation",
      });
  }
  return _cacheInvalidations;
}

/**
 * Get the histogram for hop execution duration in milliseconds.
 */
export function getHopDuration(): Histogram {
  if (_hopDuration === undefined) {
    _hopDuration = metrics.getMeter(METER_NAME).createHistogram("sift.hop.duration_ms", {
      description: "Multi-hop plan step duration in milliseconds",
      unit: "ms",
    });
  }
  return _hopDuration;
}

/**
 * Record one cache-backed search outcome.
 */
export function recordCacheAccess(status: CacheAccessStatus, intent: string): void {
  getCacheAccess().add(1, { status, intent });
}

/**
 * Record entries removed by a domain invalidation.
 */
export function recordCacheInvalidation(domain: string, removed: number): void {
  if (removed === 0) return;
  getCacheInvalidations().add(removed, { domain });
}

/**
 * Record the duration of one hop.
 */
export function recordHopDuration(tool: string, durationMs: number, ok: boolean): void {
  getHopDuration().record(durationMs, { tool, ok: String(ok) });
}
