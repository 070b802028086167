// =============================================================================
// @tidewire/shared: Analysis response schemas
// =============================================================================
// Two layers per stage: a JSON schema handed to the model as the forced tool's
// input schema, and a zod schema that actually decides what is accepted.
// =============================================================================

import { z } from "zod";
import type { JsonObjectSchema } from "../anthropic/client.js";
import { CATEGORIES, URGENCIES } from "../types.js";

// ---------------------------------------------------------------------------
// Stage 1: classification
// ---------------------------------------------------------------------------

export const Stage1ResultSchema = z.object({
  index: z.number().int().min(0),
  english_title: z.string().trim().min(1),
  category: z.enum(CATEGORIES),
  relevance: z.number().int().min(1).max(5),
});

export type Stage1Result = z.infer<typeof Stage1ResultSchema>;

/** Envelope only; each element is validated on its own */
export const Stage1EnvelopeSchema = z.object({
  results: z.array(z.unknown()),
});

export const STAGE1_TOOL_SCHEMA: JsonObjectSchema = {
  type: "object",
  properties: {
    results: {
      type: "array",
      items: {
        type: "object",
        properties: {
          index: { type: "integer", minimum: 0 },
          english_title: { type: "string" },
          category: { type: "string", enum: [...CATEGORIES] },
          relevance: { type: "integer", minimum: 1, maximum: 5 },
        },
        required: ["index", "english_title", "category", "relevance"],
      },
    },
  },
  required: ["results"],
};

// ---------------------------------------------------------------------------
// Stage 2: briefing + drafts
// ---------------------------------------------------------------------------

export const BriefingSectionsSchema = z.object({
  lead: z.string().trim().min(1),
  patterns: z.string(),
  signals: z.string(),
  watchlist: z.array(z.string()),
  data: z.array(z.string()),
});

export const DraftSchema = z.object({
  article_id: z.string().min(1),
  urgency: z.enum(URGENCIES),
  title: z.string().trim().min(1),
  long_form: z.string().trim().min(1),
  short_form: z.string().trim().min(1),
});

export const Stage2ResponseSchema = z.object({
  briefing: BriefingSectionsSchema,
  drafts: z.array(DraftSchema),
});

export type Stage2Response = z.infer<typeof Stage2ResponseSchema>;

export const STAGE2_TOOL_SCHEMA: JsonObjectSchema = {
  type: "object",
  properties: {
    briefing: {
      type: "object",
      properties: {
        lead: { type: "string", description: "The single biggest story" },
        patterns: { type: "string", description: "Cross-source themes" },
        signals: { type: "string", description: "Emerging trends" },
        watchlist: { type: "array", items: { type: "string" } },
        data: {
          type: "array",
          items: { type: "string" },
          description: "Key numbers, one fact per item",
        },
      },
      required: ["lead", "patterns", "signals", "watchlist", "data"],
    },
    drafts: {
      type: "array",
      items: {
        type: "object",
        properties: {
          article_id: { type: "string" },
          urgency: { type: "string", enum: [...URGENCIES] },
          title: { type: "string" },
          long_form: { type: "string" },
          short_form: { type: "string" },
        },
        required: ["article_id", "urgency", "title", "long_form", "short_form"],
      },
    },
  },
  required: ["briefing", "drafts"],
};
