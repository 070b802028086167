// =============================================================================
// @tidewire/shared: Zod schemas for MCP tool input validation
// =============================================================================
// Each schema validates input for one MCP tool. Ranges and defaults live
// here so tool handlers can trust validated data.
// =============================================================================

import { z } from "zod";
import { CATEGORIES, PLATFORMS } from "./types.js";

/** UTC calendar date, e.g. "2026-01-10" */
const dateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "Date must be YYYY-MM-DD");

const relevanceSchema = z.number().int().min(1).max(5);

// ---------------------------------------------------------------------------
// Read tools
// ---------------------------------------------------------------------------

export const SearchArticlesInput = z.object({
  query: z.string().min(1).max(1000),
  limit: z.number().int().min(1).max(50).default(10),
  category: z.enum(CATEGORIES).optional(),
  min_relevance: relevanceSchema.optional(),
});
export type SearchArticlesInput = z.infer<typeof SearchArticlesInput>;

export const GetArticleInput = z.object({
  article_id: z.string().min(1),
});
export type GetArticleInput = z.infer<typeof GetArticleInput>;

export const GetBriefingInput = z.object({
  date: dateSchema.optional(),
});
export type GetBriefingInput = z.infer<typeof GetBriefingInput>;

export const GetSignalsInput = z.object({
  days: z.number().int().min(1).max(30).default(7),
  min_relevance: relevanceSchema.default(4),
});
export type GetSignalsInput = z.infer<typeof GetSignalsInput>;

export const GetTrendingInput = z.object({
  days: z.number().int().min(1).max(30).default(7),
});
export type GetTrendingInput = z.infer<typeof GetTrendingInput>;

// ---------------------------------------------------------------------------
// Write tools
// ---------------------------------------------------------------------------

export const RunPublishInput = z.object({
  platform: z.enum(PLATFORMS).optional(),
  limit: z.number().int().min(1).max(100).optional(),
});
export type RunPublishInput = z.infer<typeof RunPublishInput>;

export const SkipQueueItemInput = z.object({
  id: z.string().min(1),
  reason: z.string().min(1).max(500),
});
export type SkipQueueItemInput = z.infer<typeof SkipQueueItemInput>;
