// =============================================================================
// @tidewire/server: Pipeline tools: scrape, analyze, publish, cycle, maintenance
// =============================================================================
// Each cycle is also exported as a standalone async function so the cron
// scheduler can call it directly without going through MCP.
// =============================================================================

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import {
  type AnalyzeReport,
  type DrainReport,
  type Platform,
  type RunPublishInput as RunPublishArgs,
  type ScrapeReport,
  RunPublishInput,
  drainQueue,
  errorMessage,
  reclaimStaleClaims,
  runAnalysis,
  runScrape,
} from "@tidewire/shared";
import type { ToolRegistrar, AppDependencies } from "../server.js";
import { jsonResult, runTool } from "./respond.js";

const DAY_MS = 86_400_000;

// ---------------------------------------------------------------------------
// Result types
// ---------------------------------------------------------------------------

export interface PublishCycleReport extends DrainReport {
  runId: string;
  reclaimed: number;
}

export interface CycleReport {
  runId: string;
  scrape: ScrapeReport;
  analyze: AnalyzeReport | null;
  publish: PublishCycleReport | null;
  skipped?: string;
}

export interface MaintenanceReport {
  dedupTitlesDeleted: number;
  claimsReclaimed: number;
  articlesArchived: number;
}

// ---------------------------------------------------------------------------
// Cycles
// ---------------------------------------------------------------------------

export async function runScrapeCycle(deps: AppDependencies): Promise<ScrapeReport> {
  const { stores, config } = deps;
  return runScrape(
    {
      articles: stores.articles,
      dedupTitles: stores.dedupTitles,
      scrapeRuns: stores.scrapeRuns,
      fetcher: deps.fetcher,
      embedder: deps.embedder,
      logger: deps.logger,
    },
    {
      sources: deps.sources,
      fetchTimeoutMs: config.EXTERNAL_CALL_TIMEOUT_MS,
      bodyMaxChars: config.BODY_MAX_CHARS,
      dedup: {
        semanticThreshold: config.SEMANTIC_DEDUP_THRESHOLD,
        semanticWindowDays: config.SEMANTIC_WINDOW_DAYS,
        windowCapacity: config.DEDUP_WINDOW_SIZE,
        windowDays: config.DEDUP_WINDOW_DAYS,
        embedTimeoutMs: config.EXTERNAL_CALL_TIMEOUT_MS,
      },
      triggeredBy: deps.operator,
      now: deps.clock,
    },
  );
}

export async function runAnalyzeCycle(deps: AppDependencies): Promise<AnalyzeReport> {
  const { config } = deps;
  return runAnalysis(
    {
      stores: deps.stores,
      embedder: deps.embedder,
      llm: deps.llm,
      logger: deps.logger,
    },
    {
      minRelevance: config.MIN_BRIEFING_RELEVANCE,
      platforms: config.PUBLISH_PLATFORMS,
      maxRetries: config.PUBLISH_MAX_RETRIES,
      llmTimeoutMs: config.ANALYSIS_TIMEOUT_MS,
      embedTimeoutMs: config.EXTERNAL_CALL_TIMEOUT_MS,
      triggeredBy: deps.operator,
      now: deps.clock,
    },
  );
}

function platformsWith(report: DrainReport, outcome: string): Platform[] {
  const platforms = new Set<Platform>();
  for (const item of report.items) {
    if (item.outcome === outcome) platforms.add(item.platform);
  }
  return [...platforms];
}

/**
 * Reclaims stale claims, then drains due items. Recorded as a run in mode
 * `publish`: found = items considered, new = items published.
 */
export async function runPublishCycle(
  deps: AppDependencies,
  options: RunPublishArgs = {},
): Promise<PublishCycleReport> {
  const { stores, config, clock } = deps;
  const runId = await stores.scrapeRuns.start("publish", clock().toISOString(), deps.operator);

  try {
    const reclaimed = await reclaimStaleClaims(
      stores.publishQueue,
      config.PUBLISH_CLAIM_TIMEOUT_MS,
      clock(),
    );
    const report = await drainQueue(
      {
        queue: stores.publishQueue,
        articles: stores.articles,
        adapters: deps.adapters,
        logger: deps.logger,
      },
      {
        backoff: {
          baseMs: config.PUBLISH_BACKOFF_BASE_MS,
          factor: config.PUBLISH_BACKOFF_FACTOR,
          capMs: config.PUBLISH_BACKOFF_CAP_MS,
        },
        platform: options.platform,
        limit: options.limit,
        signal: deps.shutdownSignal,
        now: clock,
      },
    );

    await stores.scrapeRuns.finish(
      runId,
      {
        articlesFound: report.considered,
        articlesNew: report.published,
        sourcesOk: platformsWith(report, "published"),
        sourcesFailed: platformsWith(report, "failed"),
        error: report.aborted ? "aborted" : undefined,
      },
      clock().toISOString(),
    );
    return { ...report, runId, reclaimed };
  } catch (err) {
    await recordFailure(deps, runId, err);
    throw err;
  }
}

/**
 * scrape, then analyze and publish only when the scrape stored something.
 */
export async function runCycle(deps: AppDependencies): Promise<CycleReport> {
  const { stores, clock } = deps;
  const runId = await stores.scrapeRuns.start("cycle", clock().toISOString(), deps.operator);
  const stages: string[] = [];

  try {
    const scrape = await runScrapeCycle(deps);
    stages.push("scrape");

    if (scrape.articlesNew === 0) {
      await stores.scrapeRuns.finish(
        runId,
        {
          articlesFound: scrape.articlesFound,
          articlesNew: 0,
          sourcesOk: stages,
          sourcesFailed: [],
        },
        clock().toISOString(),
      );
      return {
        runId,
        scrape,
        analyze: null,
        publish: null,
        skipped: "no new articles",
      };
    }

    const analyze = await runAnalyzeCycle(deps);
    stages.push("analyze");
    const publish = await runPublishCycle(deps);
    stages.push("publish");

    await stores.scrapeRuns.finish(
      runId,
      {
        articlesFound: scrape.articlesFound,
        articlesNew: scrape.articlesNew,
        sourcesOk: stages,
        sourcesFailed: analyze.status === "failed" ? ["analyze"] : [],
      },
      clock().toISOString(),
    );
    return { runId, scrape, analyze, publish };
  } catch (err) {
    await recordFailure(deps, runId, err, stages);
    throw err;
  }
}

/** dedup window cleanup, stale claim reclaim, archiving of old articles */
export async function runMaintenance(deps: AppDependencies): Promise<MaintenanceReport> {
  const { stores, config } = deps;
  const now = deps.clock();
  const daysAgo = (days: number) => new Date(now.getTime() - days * DAY_MS).toISOString();

  const dedupTitlesDeleted = await stores.dedupTitles.deleteBefore(
    daysAgo(config.DEDUP_WINDOW_DAYS),
  );
  const claimsReclaimed = await reclaimStaleClaims(
    stores.publishQueue,
    config.PUBLISH_CLAIM_TIMEOUT_MS,
    now,
  );
  const articlesArchived = await stores.articles.archiveBefore(
    daysAgo(config.ARCHIVE_AFTER_DAYS),
  );

  deps.logger.info("Maintenance complete", {
    dedupTitlesDeleted,
    claimsReclaimed,
    articlesArchived,
  });
  return { dedupTitlesDeleted, claimsReclaimed, articlesArchived };
}

async function recordFailure(
  deps: AppDependencies,
  runId: string,
  error: unknown,
  stagesDone: string[] = [],
): Promise<void> {
  try {
    await deps.stores.scrapeRuns.finish(
      runId,
      {
        articlesFound: 0,
        articlesNew: 0,
        sourcesOk: stagesDone,
        sourcesFailed: [],
        error: errorMessage(error),
      },
      deps.clock().toISOString(),
    );
  } catch (writeErr) {
    deps.logger.error("Could not record failed run", {
      runId,
      error: errorMessage(writeErr),
    });
  }
}

// ---------------------------------------------------------------------------
// Tool registrar
// ---------------------------------------------------------------------------

export const registerPipelineTools: ToolRegistrar = (
  server: McpServer,
  deps: AppDependencies,
) => {
  const { logger } = deps;

  server.tool("run_scrape", {}, async () =>
    runTool(logger, "run_scrape", {}, async () => jsonResult(await runScrapeCycle(deps))),
  );

  server.tool("run_analyze", {}, async () =>
    runTool(logger, "run_analyze", {}, async () => jsonResult(await runAnalyzeCycle(deps))),
  );

  server.tool("run_publish", RunPublishInput.shape, async (input) =>
    runTool(logger, "run_publish", input, async () =>
      jsonResult(await runPublishCycle(deps, input)),
    ),
  );

  server.tool("run_cycle", {}, async () =>
    runTool(logger, "run_cycle", {}, async () => jsonResult(await runCycle(deps))),
  );

  server.tool("run_maintenance", {}, async () =>
    runTool(logger, "run_maintenance", {}, async () => jsonResult(await runMaintenance(deps))),
  );
};
