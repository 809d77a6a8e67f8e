// ---------------------------------------------------------------------------
// Tool call types: used by wrapToolCall hook
// ---------------------------------------------------------------------------

/** Request payload for a tool invocation */
export interface ToolRequest {
  readonly toolName: string;
  readonly input: unknown;
  readonly metadata?: Record<string, unknown>;
}

/** Response from a tool invocation */
export interface ToolResponse {
  readonly output: unknown;
  readonly metadata?: Record<string, unknown>;
}

/** Next handler in the tool call chain */
export type ToolHandler = (req: ToolRequest) => Promise<ToolResponse>;

// ---------------------------------------------------------------------------
// Middleware interface
// ---------------------------------------------------------------------------

/**
 * Middleware exposed to an agent runtime. A middleware claims the tool calls
 * it owns and hands every other request to `next`.
 */
export interface SiftMiddleware {
  /** Unique middleware name */
  readonly name: string;

  /** Wrap a tool invocation: intercept, modify, or observe tool requests/responses */
  wrapToolCall(req: ToolRequest, next: ToolHandler): Promise<ToolResponse>;
}

/**
 * Compose middlewares into a single handler. The first middleware is the
 * outermost; `terminal` answers requests no middleware claims.
 */
export function composeToolHandlers(
  middlewares: readonly SiftMiddleware[],
  terminal: ToolHandler,
): ToolHandler {
  return middlewares.reduceRight<ToolHandler>(
    (next, middleware) => (req) => middleware.wrapToolCall(req, next),
    terminal,
  );
}
