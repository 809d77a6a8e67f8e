/**
 * @sift/research: multi-hop research over cached web search.
 */

export {
  createPageToolsMiddleware,
  createResearchMiddleware,
  PageToolsMiddleware,
  type PageToolsMiddlewareOptions,
  ResearchMiddleware,
  type ResearchMiddlewareOptions,
} from "./middleware.js";
export {
  DEFAULT_MAX_SNAPSHOTS,
  previewOf,
  type Snapshot,
  type SnapshotInput,
  SnapshotStore,
  type SnapshotStoreOptions,
} from "./snapshots.js";
export { extractPageDetails, HttpPageReader, type HttpPageReaderOptions } from "./page-reader.js";
export { extractKeyPoints, summarizePage, truncateAtSentence } from "./summarizer.js";
export type {
  PageDetails,
  PageReader,
  PageSummary,
  ReadOptions,
  ResearchContext,
  ResearchReport,
  SearchService,
} from "./types.js";
export {
  DEFAULT_DETAILS_TOOL_NAME,
  DEFAULT_PAGE_TIMEOUT_MS,
  DEFAULT_RESEARCH_TOOL_NAME,
  DEFAULT_SUMMARIZE_TOOL_NAME,
  MAX_CONTENT_LENGTH,
} from "./types.js";
export {
  type PageDetailsInput,
  PageDetailsInputSchema,
  type ResearchConfig,
  type ResearchConfigInput,
  ResearchConfigSchema,
  type ResearchRequest,
  type ResearchRequestInput,
  ResearchRequestSchema,
  type SummarizeInput,
  SummarizeInputSchema,
  validateResearchConfig,
} from "./validation.js";
export {
  createResearchOperations,
  RESEARCH_PLAN,
  type ResearchServices,
  ResearchWorkflow,
  type ResearchWorkflowOptions,
  STATE_KEYS,
} from "./workflow.js";
