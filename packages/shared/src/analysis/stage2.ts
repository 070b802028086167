// =============================================================================
// @tidewire/shared: Stage 2: cross-source synthesis
// =============================================================================
// Produces the five-section briefing and 3-5 post drafts from the relevant
// articles of one run. A response that fails validation is asked for once
// more; a second failure is an AnalysisParseError for the whole run.
// =============================================================================

import type { LlmClient } from "../anthropic/client.js";
import { AnalysisParseError, errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import { withTimeout } from "../timeout.js";
import type { Article, BriefingSections, PostDraft } from "../types.js";
import { STAGE2_TOOL_SCHEMA, Stage2ResponseSchema } from "./schemas.js";

export const MAX_DRAFTS = 5;
const MIN_DRAFTS = 3;
const STAGE2_ATTEMPTS = 2;

export interface Stage2Output {
  sections: BriefingSections;
  drafts: PostDraft[];
  attempts: number;
}

/** Inclusive draft count bounds for `inputs` relevant articles */
export function draftBounds(inputs: number): { min: number; max: number } {
  return { min: Math.min(MIN_DRAFTS, inputs), max: MAX_DRAFTS };
}

export function buildStage2Prompt(articles: Article[], context: Article[]): string {
  const byCategory = new Map<string, Article[]>();
  for (const a of articles) {
    const key = a.category ?? "other";
    const group = byCategory.get(key) ?? [];
    group.push(a);
    byCategory.set(key, group);
  }

  const sections: string[] = [];
  for (const category of [...byCategory.keys()].sort()) {
    const group = byCategory.get(category) ?? [];
    sections.push(`\n## ${category.toUpperCase()} (${group.length} articles)`);
    for (const a of group) {
      sections.push(
        `- id=${a.id} [${a.source}] (relevance:${a.relevance ?? "?"}) ${a.englishTitle ?? a.title}`,
      );
      const summary = a.body.slice(0, 200);
      if (summary) sections.push(`  Summary: ${summary}`);
    }
  }

  const lines = [
    "Analyze these categorized technology articles and produce two outputs:",
    "",
    "1. A morning briefing (300-500 words, wire-service style) in five sections:",
    "   lead (the biggest story), patterns (cross-source themes), signals (emerging trends),",
    "   watchlist (developing stories, one per item), data (key numbers, one fact per item).",
    "",
    `2. Post drafts for the ${MIN_DRAFTS}-${MAX_DRAFTS} most notable items. Each draft names the`,
    "   article it is about by its id, an urgency (high, medium, low), a title, a long_form",
    "   article body in markdown and a short_form social post of at most 1300 characters.",
    "",
    "If several sources report the same theme, that is a signal.",
    "",
    "CATEGORIZED ARTICLES:",
    sections.join("\n"),
  ];

  if (context.length > 0) {
    lines.push("", "RELATED COVERAGE FROM EARLIER DAYS (context only, do not draft posts about these):");
    for (const a of context) {
      lines.push(`- [${a.source}] ${a.englishTitle ?? a.title} (${a.scrapedAt.slice(0, 10)})`);
    }
  }

  return lines.join("\n");
}

/**
 * Validates a stage 2 response against the articles it was given. Throws
 * AnalysisParseError on any violation.
 */
export function parseStage2Response(
  raw: unknown,
  inputIds: ReadonlySet<string>,
): { sections: BriefingSections; drafts: PostDraft[] } {
  const parsed = Stage2ResponseSchema.safeParse(raw);
  if (!parsed.success) {
    throw new AnalysisParseError(2, parsed.error.message);
  }

  const { briefing, drafts } = parsed.data;
  const bounds = draftBounds(inputIds.size);
  if (drafts.length < bounds.min || drafts.length > bounds.max) {
    throw new AnalysisParseError(
      2,
      `expected ${bounds.min}-${bounds.max} drafts, got ${drafts.length}`,
    );
  }

  const unknownIds = drafts
    .map((d) => d.article_id)
    .filter((id) => !inputIds.has(id));
  if (unknownIds.length > 0) {
    throw new AnalysisParseError(
      2,
      `drafts reference articles outside the input: ${unknownIds.join(", ")}`,
    );
  }

  return {
    sections: briefing,
    drafts: drafts.map((d) => ({
      articleId: d.article_id,
      urgency: d.urgency,
      title: d.title,
      longForm: d.long_form,
      shortForm: d.short_form,
    })),
  };
}

export async function runStage2(
  deps: { llm: LlmClient; logger: Logger },
  articles: Article[],
  context: Article[],
  options: { timeoutMs: number },
): Promise<Stage2Output> {
  const inputIds = new Set(articles.map((a) => a.id));
  const prompt = buildStage2Prompt(articles, context);
  const failures: string[] = [];

  for (let attempt = 1; attempt <= STAGE2_ATTEMPTS; attempt++) {
    try {
      const raw = await withTimeout(
        deps.llm.complete({
          prompt,
          toolName: "record_briefing",
          toolDescription: "Record the morning briefing and the post drafts",
          schema: STAGE2_TOOL_SCHEMA,
        }),
        options.timeoutMs,
        "stage 2 synthesis",
      );
      const result = parseStage2Response(raw, inputIds);
      return { ...result, attempts: attempt };
    } catch (error) {
      failures.push(errorMessage(error));
      deps.logger.warn("Stage 2 attempt failed", {
        attempt,
        error: errorMessage(error),
      });
    }
  }

  throw new AnalysisParseError(
    2,
    `no valid response after ${STAGE2_ATTEMPTS} attempts: ${failures.join(" | ")}`,
  );
}

/** Markdown rendering stored as the briefing text */
export function renderBriefing(sections: BriefingSections): string {
  const list = (items: string[]) =>
    items.length > 0 ? items.map((i) => `- ${i}`).join("\n") : "_None._";

  return [
    "## Lead",
    sections.lead.trim(),
    "",
    "## Patterns",
    sections.patterns.trim() || "_None._",
    "",
    "## Signals",
    sections.signals.trim() || "_None._",
    "",
    "## Watchlist",
    list(sections.watchlist),
    "",
    "## Data",
    list(sections.data),
  ].join("\n");
}
