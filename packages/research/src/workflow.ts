/**
 * Multi-hop research: search → details(search) → summary(details).
 *
 * Each hop writes its output into shared state as well as returning it,
 * so the report is assembled from state once the plan has run.
 */

import { createLogger, isRecord, type Logger } from "@sift/core";
import {
  DependencyPlan,
  defineOperation,
  dependencyOutputs,
  type HopArguments,
  HopExecutor,
  type OperationRegistry,
  type SharedState,
  sharedState,
} from "@sift/orchestration";
import { classifyIntent, parseInput, type SearchPayload } from "@sift/web-search";
import { summarizePage } from "./summarizer.js";
import type {
  PageDetails,
  PageReader,
  PageSummary,
  ResearchContext,
  ResearchReport,
  SearchService,
} from "./types.js";
import {
  DetailsHopArgsSchema,
  type ResearchRequest,
  SearchHopArgsSchema,
  SummaryHopArgsSchema,
} from "./validation.js";

const MAX_RELATED = 10;
const SPIDER_DEPTH = 0;
const MAX_LINKS_PER_PAGE = 3;

export const RESEARCH_PLAN = new DependencyPlan([
  { name: "search", tool: "search" },
  { name: "details", tool: "details", dependsOn: ["search"] },
  { name: "summary", tool: "summary", dependsOn: ["details"] },
]);

/** Shared-state keys the research hops write */
export const STATE_KEYS = {
  searchPayload: "searchPayload",
  detailedResults: "detailedResults",
  summaries: "summaries",
} as const;

export interface ResearchServices {
  readonly search: SearchService;
  readonly reader: PageReader;
}

function isSearchPayload(value: unknown): value is SearchPayload {
  return isRecord(value) && Array.isArray(value.results) && isRecord(value.cacheMetadata);
}

function isPageDetails(value: unknown): value is PageDetails {
  return (
    isRecord(value) &&
    typeof value.url === "string" &&
    typeof value.contentSnippet === "string" &&
    Array.isArray(value.headings)
  );
}

function isPageSummary(value: unknown): value is PageSummary {
  return isRecord(value) && typeof value.url === "string" && typeof value.summary === "string";
}

function listOf<T>(value: unknown, guard: (item: unknown) => item is T): T[] {
  return Array.isArray(value) ? value.filter(guard) : [];
}

function contextSignal(args: HopArguments): AbortSignal | undefined {
  const context = args.context;
  return isRecord(context) && context.signal instanceof AbortSignal ? context.signal : undefined;
}

/**
 * The operations behind the research plan, keyed by tool name.
 */
export function createResearchOperations(services: ResearchServices): OperationRegistry {
  return {
    search: defineOperation({
      needs: ["context", "state"],
      async run(args) {
        const { query, count, intent } = parseInput(SearchHopArgsSchema, args, "search hop arguments");
        const payload = await services.search.search(
          {
            query,
            count,
            offset: 0,
            page: 1,
            intent: intent ?? classifyIntent(query).intent,
            getRelated: true,
            relatedCount: Math.min(count, MAX_RELATED),
          },
          contextSignal(args),
        );
        sharedState(args)[STATE_KEYS.searchPayload] = payload;
        return payload;
      },
    }),

    details: defineOperation({
      needs: ["context", "dependencies", "state"],
      async run(args) {
        const { detailCount, captureSnapshots } = parseInput(
          DetailsHopArgsSchema,
          args,
          "details hop arguments",
        );
        const search = dependencyOutputs(args).search;
        const selected = isSearchPayload(search) ? search.results.slice(0, detailCount) : [];
        const signal = contextSignal(args);

        const detailed: PageDetails[] = [];
        for (const result of selected) {
          if (result.url === "") continue;
          detailed.push(
            captureSnapshots
              ? await services.reader.read(result.url, signal, { captureSnapshot: true })
              : await services.reader.read(result.url, signal),
          );
        }
        sharedState(args)[STATE_KEYS.detailedResults] = detailed;
        return detailed;
      },
    }),

    summary: defineOperation({
      needs: ["dependencies", "state"],
      run(args) {
        const { summaryLength } = parseInput(SummaryHopArgsSchema, args, "summary hop arguments");
        const details = listOf(dependencyOutputs(args).details, isPageDetails);
        if (details.length === 0) {
          return { summaries: [] };
        }
        const summaries = details.map((page) => summarizePage(page, summaryLength));
        sharedState(args)[STATE_KEYS.summaries] = summaries;
        return { summaries };
      },
    }),
  };
}

export interface ResearchWorkflowOptions {
  readonly logger?: Logger;
}

export class ResearchWorkflow {
  private readonly executor: HopExecutor<ResearchContext>;
  private readonly logger: Logger;

  constructor(services: ResearchServices, options: ResearchWorkflowOptions = {}) {
    this.logger = options.logger ?? createLogger("research");
    this.executor = new HopExecutor<ResearchContext>(createResearchOperations(services), {
      logger: this.logger,
    });
  }

  async run(request: ResearchRequest, signal?: AbortSignal): Promise<ResearchReport> {
    const state: SharedState = {
      detailCount: request.detailCount,
      spiderDepth: SPIDER_DEPTH,
      maxLinksPerPage: MAX_LINKS_PER_PAGE,
      captureSnapshots: request.captureSnapshots,
    };
    const plan = RESEARCH_PLAN.withParams({
      search: {
        query: request.query,
        count: request.count,
        ...(request.intent !== undefined ? { intent: request.intent } : {}),
      },
      details: { detailCount: request.detailCount, captureSnapshots: request.captureSnapshots },
      summary: { summaryLength: request.summaryLength },
    });

    const context: ResearchContext = signal !== undefined ? { signal } : {};
    const result = await this.executor.execute(plan, context, state);

    const search = state[STATE_KEYS.searchPayload];
    const details = listOf(state[STATE_KEYS.detailedResults], isPageDetails);
    const report: ResearchReport = {
      query: request.query,
      search: isSearchPayload(search) ? search : undefined,
      details,
      summaries: listOf(state[STATE_KEYS.summaries], isPageSummary),
      snapshots: details.flatMap((page) => (page.snapshotId !== undefined ? [page.snapshotId] : [])),
      trace: result.trace,
    };

    this.logger.info(
      `research for "${request.query}" finished with ${report.details.length} details and ${report.summaries.length} summaries`,
    );
    return report;
  }
}
