/**
 * @sift/telemetry: OpenTelemetry instrumentation helpers.
 *
 * - withSpan(): run a function inside a span
 * - withTracing(): middleware wrapper
 * - cache / hop metrics
 *
 * Registering an SDK (exporters, samplers) is left to the host process.
 */

export { SpanStatusCode, trace } from "@opentelemetry/api";
export {
  type CacheAccessStatus,
  getCacheAccess,
  getCacheInvalidations,
  getHopDuration,
  recordCacheAccess,
  recordCacheInvalidation,
  recordHopDuration,
} from "./metrics.js";
export { annotateActiveSpan, withSpan } from "./span-helpers.js";
export { withTracing } from "./traced-middleware.js";
export type { SpanAttributes, SpanAttributeValue } from "./types.js";
