/**
 * Zod schemas for research requests, hop arguments and configuration.
 */

import { ConfigInvalidError } from "@sift/errors";
import {
  MAX_QUERY_LENGTH,
  SearchIntentSchema,
  WebSearchConfigSchema,
} from "@sift/web-search";
import { z } from "zod";
import { DEFAULT_MAX_SNAPSHOTS } from "./snapshots.js";
import {
  DEFAULT_DETAILS_TOOL_NAME,
  DEFAULT_PAGE_TIMEOUT_MS,
  DEFAULT_RESEARCH_TOOL_NAME,
  DEFAULT_SUMMARIZE_TOOL_NAME,
} from "./types.js";

export const ResearchRequestSchema = z.object({
  query: z
    .string()
    .trim()
    .min(1, { message: "query must not be empty" })
    .max(MAX_QUERY_LENGTH, { message: `query must be at most ${MAX_QUERY_LENGTH} characters` }),
  count: z.number().int().min(1).max(15).default(6),
  detailCount: z.number().int().min(1).max(6).default(3),
  summaryLength: z.number().int().min(120).max(600).default(300),
  /** Skip classification and search under this intent */
  intent: SearchIntentSchema.optional(),
  /** Record a snapshot of every page read */
  captureSnapshots: z.boolean().default(false),
});

export type ResearchRequestInput = z.input<typeof ResearchRequestSchema>;
export type ResearchRequest = z.output<typeof ResearchRequestSchema>;

// Hop arguments arrive as an untyped bag; each operation parses its own.

export const SearchHopArgsSchema = z.object({
  query: z.string().min(1),
  count: z.number().int().min(1),
  intent: SearchIntentSchema.optional(),
});

export const DetailsHopArgsSchema = z.object({
  detailCount: z.number().int().min(1),
  captureSnapshots: z.boolean().default(false),
});

export const SummaryHopArgsSchema = z.object({
  summaryLength: z.number().int().min(1),
});

function isHttpUrl(value: string): boolean {
  return URL.canParse(value) && /^https?:$/.test(new URL(value).protocol);
}

const urlField = z
  .string()
  .trim()
  .refine(isHttpUrl, { message: "url must be an absolute http or https URL" });

export const PageDetailsInputSchema = z.object({
  url: urlField,
  captureSnapshot: z.boolean().default(false),
});

export type PageDetailsInput = z.output<typeof PageDetailsInputSchema>;

export const SummarizeInputSchema = z.object({
  url: urlField,
  maxLength: z.number().int().min(100).max(2000).default(500),
  extractKeyPoints: z.boolean().default(true),
});

export type SummarizeInput = z.output<typeof SummarizeInputSchema>;

export const ResearchConfigSchema = z.object({
  toolName: z.string().min(1).default(DEFAULT_RESEARCH_TOOL_NAME),
  detailsToolName: z.string().min(1).default(DEFAULT_DETAILS_TOOL_NAME),
  summarizeToolName: z.string().min(1).default(DEFAULT_SUMMARIZE_TOOL_NAME),
  pageTimeoutMs: z.number().int().min(1000).max(60_000).default(DEFAULT_PAGE_TIMEOUT_MS),
  maxSnapshots: z.number().int().min(1).max(10_000).default(DEFAULT_MAX_SNAPSHOTS),
  search: WebSearchConfigSchema.default({}),
});

export type ResearchConfigInput = z.input<typeof ResearchConfigSchema>;
export type ResearchConfig = z.output<typeof ResearchConfigSchema>;

/**
 * Validate research configuration.
 * @throws ConfigInvalidError listing every offending field
 */
export function validateResearchConfig(config: unknown): ResearchConfig {
  const parsed = ResearchConfigSchema.safeParse(config ?? {});
  if (!parsed.success) {
    throw ConfigInvalidError.fromSchemaIssues("research", parsed.error.issues);
  }
  return parsed.data;
}
