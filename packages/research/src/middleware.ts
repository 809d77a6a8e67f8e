/**
 * Research tools: the multi-hop workflow as one tool, plus page details
 * and page summaries for a single URL.
 */

import {
  createLogger,
  type Logger,
  type SiftMiddleware,
  type ToolHandler,
  type ToolRequest,
  type ToolResponse,
} from "@sift/core";
import { createCachedSearch, parseInput } from "@sift/web-search";
import { HttpPageReader } from "./page-reader.js";
import { SnapshotStore } from "./snapshots.js";
import { summarizePage } from "./summarizer.js";
import {
  DEFAULT_DETAILS_TOOL_NAME,
  DEFAULT_RESEARCH_TOOL_NAME,
  DEFAULT_SUMMARIZE_TOOL_NAME,
  type PageReader,
  type PageSummary,
} from "./types.js";
import {
  PageDetailsInputSchema,
  type ResearchConfig,
  type ResearchConfigInput,
  ResearchRequestSchema,
  SummarizeInputSchema,
  validateResearchConfig,
} from "./validation.js";
import { ResearchWorkflow } from "./workflow.js";

export interface ResearchMiddlewareOptions {
  readonly toolName?: string;
}

export class ResearchMiddleware implements SiftMiddleware {
  readonly name = "research";
  private readonly workflow: ResearchWorkflow;
  private readonly toolName: string;

  constructor(workflow: ResearchWorkflow, options: ResearchMiddlewareOptions = {}) {
    this.workflow = workflow;
    this.toolName = options.toolName ?? DEFAULT_RESEARCH_TOOL_NAME;
  }

  async wrapToolCall(req: ToolRequest, next: ToolHandler): Promise<ToolResponse> {
    if (req.toolName !== this.toolName) {
      return next(req);
    }

    const request = parseInput(ResearchRequestSchema, req.input, `${this.toolName} input`);
    const report = await this.workflow.run(request);
    return {
      output: report,
      metadata: {
        provider: "research",
        resultCount: report.search?.results.length ?? 0,
        detailCount: report.details.length,
        summaryCount: report.summaries.length,
      },
    };
  }
}

export interface PageToolsMiddlewareOptions {
  readonly detailsToolName?: string;
  readonly summarizeToolName?: string;
  readonly logger?: Logger;
}

/**
 * Claims the page details and page summary tools. Both read the page
 * through the same PageReader the research workflow uses.
 */
export class PageToolsMiddleware implements SiftMiddleware {
  readonly name = "page-tools";
  private readonly reader: PageReader;
  private readonly detailsToolName: string;
  private readonly summarizeToolName: string;
  private readonly logger: Logger;

  constructor(reader: PageReader, options: PageToolsMiddlewareOptions = {}) {
    this.reader = reader;
    this.detailsToolName = options.detailsToolName ?? DEFAULT_DETAILS_TOOL_NAME;
    this.summarizeToolName = options.summarizeToolName ?? DEFAULT_SUMMARIZE_TOOL_NAME;
    this.logger = options.logger ?? createLogger("research");
  }

  async wrapToolCall(req: ToolRequest, next: ToolHandler): Promise<ToolResponse> {
    if (req.toolName === this.detailsToolName) {
      return this.pageDetails(req.input);
    }
    if (req.toolName === this.summarizeToolName) {
      return this.summarize(req.input);
    }
    return next(req);
  }

  private async pageDetails(input: unknown): Promise<ToolResponse> {
    const args = parseInput(PageDetailsInputSchema, input, `${this.detailsToolName} input`);
    const details = args.captureSnapshot
      ? await this.reader.read(args.url, undefined, { captureSnapshot: true })
      : await this.reader.read(args.url);

    return {
      output: details,
      metadata: {
        provider: "research",
        domain: details.domain,
        ...(details.snapshotId !== undefined ? { snapshotId: details.snapshotId } : {}),
      },
    };
  }

  private async summarize(input: unknown): Promise<ToolResponse> {
    const args = parseInput(SummarizeInputSchema, input, `${this.summarizeToolName} input`);
    const page = await this.reader.read(args.url);
    const summary: PageSummary = summarizePage(page, args.maxLength);
    this.logger.debug(`summarized ${args.url} to ${summary.summary.length} characters`);

    return {
      output: args.extractKeyPoints ? summary : { ...summary, keyPoints: [] },
      metadata: { provider: "research", domain: summary.domain, contentLength: summary.contentLength },
    };
  }
}

function createPageReader(parsed: ResearchConfig, logger: Logger): HttpPageReader {
  return new HttpPageReader({
    timeoutMs: parsed.pageTimeoutMs,
    logger,
    snapshots: new SnapshotStore({ maxEntries: parsed.maxSnapshots }),
  });
}

/**
 * Factory: wires a cached search and an HTTP page reader into a
 * ResearchMiddleware from validated configuration.
 */
export function createResearchMiddleware(
  config: ResearchConfigInput = {},
  logger: Logger = createLogger("research"),
): ResearchMiddleware {
  const parsed = validateResearchConfig(config);
  const workflow = new ResearchWorkflow(
    {
      search: createCachedSearch(parsed.search, logger),
      reader: createPageReader(parsed, logger),
    },
    { logger },
  );
  return new ResearchMiddleware(workflow, { toolName: parsed.toolName });
}

/**
 * Factory: creates a validated PageToolsMiddleware. Pass a reader to share
 * its snapshot store with a research workflow.
 */
export function createPageToolsMiddleware(
  config: ResearchConfigInput = {},
  logger: Logger = createLogger("research"),
  reader?: PageReader,
): PageToolsMiddleware {
  const parsed = validateResearchConfig(config);
  return new PageToolsMiddleware(reader ?? createPageReader(parsed, logger), {
    detailsToolName: parsed.detailsToolName,
    summarizeToolName: parsed.summarizeToolName,
    logger,
  });
}
