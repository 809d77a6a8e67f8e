/**
 * Wrap a SiftMiddleware so every tool call runs inside a span.
 *
 * Span names follow: `sift.middleware.{name}.wrap_tool_call`
 */

import type { SiftMiddleware } from "@sift/core";
import { withSpan } from "./span-helpers.js";

/**
 * Wrap a SiftMiddleware so every tool call it sees runs inside a span
 * tagged with the requested tool name. Errors propagate unchanged.
 */
export function withTracing(middleware: SiftMiddleware): SiftMiddleware {
  const spanName = `sift.middleware.${middleware.name}.wrap_tool_call`;
  const original = middleware.wrapToolCall.bind(middleware);

  return {
    name: middleware.name,
    wrapToolCall: (req, next) =>
      withSpan(spanName, { "tool.name": req.toolName }, () => original(req, next)),
  };
}
