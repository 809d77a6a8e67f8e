/**
 * @sift/core: shared runtime contracts.
 */

export const PACKAGE_NAME = "@sift/core" as const;

export { type Clock, systemClock } from "./clock-types.js";
export { isRecord } from "./record.js";
export { createLogger, type Logger, type LogLevel, resolveLogLevel, silentLogger } from "./logger.js";
export {
  composeToolHandlers,
  type SiftMiddleware,
  type ToolHandler,
  type ToolRequest,
  type ToolResponse,
} from "./middleware-types.js";
