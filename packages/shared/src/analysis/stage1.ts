// =============================================================================
// @tidewire/shared: Stage 1: translate, categorize, score
// =============================================================================
// Pending articles go to the model in batches. Every result element is
// validated on its own; an article whose result is missing or malformed
// stays `pending` and is picked up again by the next run. Nothing is ever
// defaulted.
// =============================================================================

import type { LlmClient } from "../anthropic/client.js";
import { AnalysisParseError, errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import type { ArticleStore } from "../stores.js";
import { withTimeout } from "../timeout.js";
import { CATEGORIES, type Article, type Enrichment } from "../types.js";
import {
  STAGE1_TOOL_SCHEMA,
  Stage1EnvelopeSchema,
  Stage1ResultSchema,
} from "./schemas.js";

export const STAGE1_BATCH_SIZE = 50;

export interface ClassifiedArticle {
  article: Article;
  enrichment: Enrichment;
}

export interface Stage1Report {
  classified: ClassifiedArticle[];
  leftPending: number;
  batchesFailed: number;
  errors: string[];
}

export interface Stage1Deps {
  articles: ArticleStore;
  llm: LlmClient;
  logger: Logger;
}

export function buildStage1Prompt(batch: Article[]): string {
  const items = batch
    .map(
      (a, i) =>
        `[${i}] SOURCE: ${a.source} | TITLE: ${a.title.slice(0, 200)} | SUMMARY: ${a.body.slice(0, 300)}`,
    )
    .join("\n");

  return [
    "You are a technology intelligence analyst. For each article below:",
    "1. Translate the title to English (keep it as-is if it is already English)",
    `2. Categorize it as one of: ${CATEGORIES.join(", ")}`,
    "3. Score its relevance 1-5 for enterprise technology and AI (5 = critical, 1 = irrelevant)",
    "",
    "Return one result per article, referring to it by its [index].",
    "",
    "ARTICLES:",
    items,
  ].join("\n");
}

/**
 * Validates one batch response. Returns the enrichment for every index that
 * has a well-formed result; the first result for an index wins.
 */
export function parseStage1Response(
  raw: unknown,
  batchSize: number,
): { enrichments: Map<number, Enrichment>; problems: string[] } {
  const envelope = Stage1EnvelopeSchema.safeParse(raw);
  if (!envelope.success) {
    throw new AnalysisParseError(1, `response envelope: ${envelope.error.message}`);
  }

  const enrichments = new Map<number, Enrichment>();
  const problems: string[] = [];

  envelope.data.results.forEach((element, position) => {
    const parsed = Stage1ResultSchema.safeParse(element);
    if (!parsed.success) {
      problems.push(`result ${position}: ${parsed.error.issues[0]?.message ?? "invalid"}`);
      return;
    }
    const { index, english_title, category, relevance } = parsed.data;
    if (index >= batchSize) {
      problems.push(`result ${position}: index ${index} out of range`);
      return;
    }
    if (enrichments.has(index)) {
      problems.push(`result ${position}: duplicate index ${index}`);
      return;
    }
    enrichments.set(index, { englishTitle: english_title, category, relevance });
  });

  return { enrichments, problems };
}

export async function runStage1(
  deps: Stage1Deps,
  pending: Article[],
  options: { timeoutMs: number; batchSize?: number },
): Promise<Stage1Report> {
  const batchSize = options.batchSize ?? STAGE1_BATCH_SIZE;
  const log = deps.logger.child({ component: "stage1" });
  const report: Stage1Report = {
    classified: [],
    leftPending: 0,
    batchesFailed: 0,
    errors: [],
  };

  for (let start = 0; start < pending.length; start += batchSize) {
    const batch = pending.slice(start, start + batchSize);
    const batchNum = start / batchSize + 1;

    let parsed: ReturnType<typeof parseStage1Response>;
    try {
      const raw = await withTimeout(
        deps.llm.complete({
          prompt: buildStage1Prompt(batch),
          toolName: "record_classifications",
          toolDescription: "Record the translated title, category and relevance of every article",
          schema: STAGE1_TOOL_SCHEMA,
          maxTokens: 4096,
        }),
        options.timeoutMs,
        `stage 1 batch ${batchNum}`,
      );
      parsed = parseStage1Response(raw, batch.length);
    } catch (error) {
      report.batchesFailed++;
      report.leftPending += batch.length;
      report.errors.push(`batch ${batchNum}: ${errorMessage(error)}`);
      log.error("Stage 1 batch failed, articles left pending", {
        batch: batchNum,
        size: batch.length,
        error: errorMessage(error),
      });
      continue;
    }

    for (const problem of parsed.problems) {
      log.warn("Stage 1 result rejected", { batch: batchNum, problem });
    }

    for (const [index, article] of batch.entries()) {
      const enrichment = parsed.enrichments.get(index);
      if (!enrichment) {
        report.leftPending++;
        continue;
      }
      const applied = await deps.articles.applyEnrichment(article.id, enrichment);
      if (applied) {
        report.classified.push({
          article: { ...article, ...enrichment, status: "analyzed" },
          enrichment,
        });
      }
    }

    const missing = batch.length - parsed.enrichments.size;
    if (missing > 0) {
      report.errors.push(`batch ${batchNum}: ${missing} article(s) without a valid result`);
    }
  }

  log.info("Stage 1 complete", {
    classified: report.classified.length,
    leftPending: report.leftPending,
    batchesFailed: report.batchesFailed,
  });

  return report;
}
