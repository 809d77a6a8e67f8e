/**
 * Span helpers for the spans sift emits on the "sift" tracer:
 *
 * - `sift.search`: one cached search, tagged with `search.intent` and then
 *   annotated with `search.cache_status` (hit | miss | refresh) and
 *   `search.result_count`
 * - `sift.hop.<hop>`: one orchestration hop, tagged with `hop.tool` and
 *   `hop.depends_on` (comma-joined hop names)
 * - `sift.middleware.<name>.wrap_tool_call`: one tool call through a traced
 *   middleware, tagged with `tool.name`
 *
 * A failing span carries the recorded exception and ERROR status.
 */

import { SpanStatusCode, trace } from "@opentelemetry/api";
import type { SpanAttributes } from "./types.js";

const TRACER_NAME = "sift";

/**
 * Run `fn` as the active span `name`. Without a registered tracer
 * provider the span is a no-op and `fn` runs as usual.
 *
 * @throws whatever `fn` throws, after recording it on the span
 */
export async function withSpan<T>(
  name: string,
  attributes: SpanAttributes,
  fn: () => Promise<T>,
): Promise<T> {
  const tracer = trace.getTracer(TRACER_NAME);
  return tracer.startActiveSpan(name, async (span) => {
    try {
      for (const [key, value] of Object.entries(attributes)) {
        span.setAttribute(key, value);
      }
      const result = await fn();
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      if (error instanceof Error) {
        span.recordException(error);
      }
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: error instanceof Error ? error.message : String(error),
      });
      throw error;
    } finally {
      span.end();
    }
  });
}

/**
 * Set attributes on the currently active span, if any.
 */
export function annotateActiveSpan(attributes: SpanAttributes): void {
  const span = trace.getActiveSpan();
  if (span === undefined) return;
  for (const [key, value] of Object.entries(attributes)) {
    span.setAttribute(key, value);
  }
}
