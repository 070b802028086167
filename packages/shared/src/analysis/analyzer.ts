// =============================================================================
// @tidewire/shared: Analyze cycle
// =============================================================================
// pending articles -> stage 1 -> relevance filter -> historical context
//   -> stage 2 -> briefing + queue items -> AnalysisRun (written once)
//
// The cycle is also recorded as a ScrapeRun in mode `analyze`, so the run
// history shows scrape and analyze side by side.
// =============================================================================

import crypto from "node:crypto";
import type { LlmClient } from "../anthropic/client.js";
import type { Embedder } from "../embeddings/index.js";
import { AnalysisParseError, errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import type { Stores } from "../stores.js";
import { withTimeout } from "../timeout.js";
import {
  LONG_FORM_PLATFORMS,
  type AnalysisRun,
  type AnalysisRunStatus,
  type Article,
  type EnqueueInput,
  type Platform,
  type PostDraft,
} from "../types.js";
import { runStage1 } from "./stage1.js";
import { renderBriefing, runStage2 } from "./stage2.js";

export const PENDING_LIMIT = 500;
const CONTEXT_TITLES = 5;
const CONTEXT_LIMIT = 10;
const LEAD_FALLBACK_CHARS = 500;

export interface AnalyzeDeps {
  stores: Pick<
    Stores,
    "articles" | "scrapeRuns" | "briefings" | "analysisRuns"
  >;
  embedder: Embedder;
  llm: LlmClient;
  logger: Logger;
}

export interface AnalyzeOptions {
  minRelevance: number;
  platforms: Platform[];
  maxRetries: number;
  llmTimeoutMs: number;
  embedTimeoutMs: number;
  pendingLimit?: number;
  triggeredBy?: string;
  now?: () => Date;
}

export interface AnalyzeReport {
  analysisRunId: string;
  scrapeRunId: string;
  status: AnalysisRunStatus;
  pending: number;
  classified: number;
  leftPending: number;
  relevant: number;
  contextArticles: number;
  briefingId?: string;
  drafts: number;
  postsQueued: number;
  errors: string[];
}

/**
 * Queue items for one draft: one per platform. Long-form platforms take the
 * article body and fall back to the short post; short-form platforms take
 * the short post and fall back to the briefing lead.
 */
export function draftQueueItems(
  draft: PostDraft,
  platforms: Platform[],
  lead: string,
  maxRetries: number,
  briefingId: string,
): EnqueueInput[] {
  return platforms.map((platform) => {
    const longForm = LONG_FORM_PLATFORMS.has(platform);
    return {
      platform,
      title: longForm ? draft.title : undefined,
      body: longForm ? draft.longForm : draft.shortForm,
      fallbackBody: longForm
        ? draft.shortForm
        : lead.slice(0, LEAD_FALLBACK_CHARS) || undefined,
      urgency: draft.urgency,
      language: "en",
      maxRetries,
      briefingId,
      articleId: draft.articleId,
    };
  });
}

export async function runAnalysis(
  deps: AnalyzeDeps,
  options: AnalyzeOptions,
): Promise<AnalyzeReport> {
  const now = options.now ?? (() => new Date());
  const log = deps.logger.child({ component: "analyze" });
  const { stores } = deps;
  const startedAt = now();

  const scrapeRunId = await stores.scrapeRuns.start(
    "analyze",
    startedAt.toISOString(),
    options.triggeredBy,
  );
  const report: AnalyzeReport = {
    analysisRunId: crypto.randomUUID(),
    scrapeRunId,
    status: "skipped",
    pending: 0,
    classified: 0,
    leftPending: 0,
    relevant: 0,
    contextArticles: 0,
    drafts: 0,
    postsQueued: 0,
    errors: [],
  };
  let inputArticleIds: string[] = [];
  let briefingText: string | undefined;

  try {
    const pending = await stores.articles.listPending(
      options.pendingLimit ?? PENDING_LIMIT,
    );
    report.pending = pending.length;

    if (pending.length > 0) {
      const stage1 = await runStage1(
        { articles: stores.articles, llm: deps.llm, logger: log },
        pending,
        { timeoutMs: options.llmTimeoutMs },
      );
      report.classified = stage1.classified.length;
      report.leftPending = stage1.leftPending;
      report.errors.push(...stage1.errors.map((e) => `stage 1 ${e}`));

      const relevant = stage1.classified
        .map((c) => c.article)
        .filter((a) => (a.relevance ?? 0) >= options.minRelevance)
        .sort((a, b) => (b.relevance ?? 0) - (a.relevance ?? 0));
      report.relevant = relevant.length;
      inputArticleIds = relevant.map((a) => a.id);

      if (relevant.length > 0) {
        const context = await historicalContext(deps, relevant, options, log);
        report.contextArticles = context.length;

        try {
          const stage2 = await runStage2(
            { llm: deps.llm, logger: log },
            relevant,
            context,
            { timeoutMs: options.llmTimeoutMs },
          );

          const briefingId = crypto.randomUUID();
          briefingText = renderBriefing(stage2.sections);
          const queueItems = stage2.drafts.flatMap((draft) =>
            draftQueueItems(
              draft,
              options.platforms,
              stage2.sections.lead,
              options.maxRetries,
              briefingId,
            ),
          );
          await stores.briefings.insert(
            {
              id: briefingId,
              sections: stage2.sections,
              text: briefingText,
              articleCount: relevant.length,
              modelUsed: deps.llm.model,
              analysisRunId: report.analysisRunId,
              createdAt: now().toISOString(),
            },
            queueItems,
          );
          report.briefingId = briefingId;
          report.drafts = stage2.drafts.length;
          report.postsQueued = queueItems.length;
          report.status = "completed";
        } catch (error) {
          if (!(error instanceof AnalysisParseError)) throw error;
          report.status = "failed";
          report.errors.push(error.message);
          log.error("Stage 2 failed, no briefing produced", {
            error: error.message,
          });
        }
      }
    }

    await stores.analysisRuns.insert(buildRun(report, deps.llm.model, inputArticleIds, briefingText, now()));
    await stores.scrapeRuns.finish(
      scrapeRunId,
      {
        articlesFound: report.pending,
        articlesNew: report.relevant,
        sourcesOk: report.status === "failed" ? [] : ["analyze_pipeline"],
        sourcesFailed: report.status === "failed" ? ["analyze_pipeline"] : [],
        error: report.status === "failed" ? report.errors.at(-1) : undefined,
      },
      now().toISOString(),
    );
  } catch (error) {
    await recordAbort(deps, scrapeRunId, report, now(), errorMessage(error));
    throw error;
  }

  log.info("Analyze complete", {
    status: report.status,
    pending: report.pending,
    classified: report.classified,
    relevant: report.relevant,
    drafts: report.drafts,
    postsQueued: report.postsQueued,
  });

  return report;
}

/**
 * Related past coverage for the top titles. Failure only costs the prompt
 * its context; it is logged and the run goes on.
 */
async function historicalContext(
  deps: AnalyzeDeps,
  relevant: Article[],
  options: AnalyzeOptions,
  log: Logger,
): Promise<Article[]> {
  const titles = relevant
    .slice(0, CONTEXT_TITLES)
    .map((a) => a.englishTitle ?? a.title)
    .join("\n");

  try {
    const vector = await withTimeout(
      deps.embedder.embed(titles, "RETRIEVAL_QUERY"),
      options.embedTimeoutMs,
      "embed context query",
    );
    const scored = await deps.stores.articles.search(vector, {
      limit: CONTEXT_LIMIT,
      excludeIds: relevant.map((a) => a.id),
    });
    return scored.map((s) => s.article);
  } catch (error) {
    log.warn("Historical context unavailable", { error: errorMessage(error) });
    return [];
  }
}

function buildRun(
  report: AnalyzeReport,
  model: string,
  inputArticleIds: string[],
  briefingText: string | undefined,
  createdAt: Date,
): AnalysisRun {
  return {
    id: report.analysisRunId,
    model,
    inputArticleIds,
    articlesConsumed: report.classified,
    briefingId: report.briefingId,
    briefingText,
    status: report.status,
    errors: report.errors,
    createdAt: createdAt.toISOString(),
  };
}

async function recordAbort(
  deps: AnalyzeDeps,
  scrapeRunId: string,
  report: AnalyzeReport,
  finishedAt: Date,
  error: string,
): Promise<void> {
  try {
    await deps.stores.scrapeRuns.finish(
      scrapeRunId,
      {
        articlesFound: report.pending,
        articlesNew: report.relevant,
        sourcesOk: [],
        sourcesFailed: ["analyze_pipeline"],
        error,
      },
      finishedAt.toISOString(),
    );
  } catch (finishError) {
    deps.logger.error("Failed to record analyze run failure", {
      scrapeRunId,
      error: errorMessage(finishError),
      originalError: error,
    });
  }
}
