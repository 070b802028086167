// =============================================================================
// @tidewire/server: Signal tools: get_signals, get_trending, list_sources
// =============================================================================
// Threads and momentum are computed on demand from stored articles; nothing
// here is persisted.
// =============================================================================

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import {
  GetSignalsInput,
  GetTrendingInput,
  HIGH_RELEVANCE,
  categoryMomentum,
  clusterSignals,
  summarizeSources,
} from "@tidewire/shared";
import type { ToolRegistrar, AppDependencies } from "../server.js";
import { jsonResult, runTool } from "./respond.js";

const DAY_MS = 86_400_000;
/** Upper bound on articles clustered per call */
const SCAN_LIMIT = 2000;
const SOURCE_HEALTH_DAYS = 30;
const SOURCE_HEALTH_RUNS = 100;

function daysBefore(now: Date, days: number): string {
  return new Date(now.getTime() - days * DAY_MS).toISOString();
}

export const registerSignalTools: ToolRegistrar = (
  server: McpServer,
  deps: AppDependencies,
) => {
  const { stores, logger, config, clock } = deps;

  // -------------------------------------------------------------------------
  // get_signals: cross-source threads over the last `days`
  // -------------------------------------------------------------------------
  server.tool("get_signals", GetSignalsInput.shape, async (input) =>
    runTool(logger, "get_signals", input, async () => {
      const now = clock();
      const articles = await stores.articles.listScraped({
        since: daysBefore(now, input.days),
        minRelevance: input.min_relevance,
        limit: SCAN_LIMIT,
      });
      const threads = clusterSignals(articles, config.SIGNAL_CLUSTER_THRESHOLD);
      return jsonResult({
        days: input.days,
        minRelevance: input.min_relevance,
        articlesConsidered: articles.length,
        threadCount: threads.length,
        threads,
      });
    }),
  );

  // -------------------------------------------------------------------------
  // get_trending: category volume, this window against the one before
  // -------------------------------------------------------------------------
  server.tool("get_trending", GetTrendingInput.shape, async (input) =>
    runTool(logger, "get_trending", input, async () => {
      const now = clock();
      const windowStart = daysBefore(now, input.days);
      const [current, previous] = await Promise.all([
        stores.articles.countByCategory({ since: windowStart, until: now.toISOString() }),
        stores.articles.countByCategory({ since: daysBefore(now, 2 * input.days), until: windowStart }),
      ]);
      return jsonResult({
        days: input.days,
        categories: categoryMomentum(current, previous),
      });
    }),
  );

  // -------------------------------------------------------------------------
  // list_sources: per-source volume, signal quality, last success/failure
  // -------------------------------------------------------------------------
  server.tool("list_sources", {}, async () =>
    runTool(logger, "list_sources", {}, async () => {
      const now = clock();
      const [volumes, runs] = await Promise.all([
        stores.articles.volumeBySource({ since: daysBefore(now, SOURCE_HEALTH_DAYS) }, HIGH_RELEVANCE),
        stores.scrapeRuns.listRecent(SOURCE_HEALTH_RUNS, "scrape"),
      ]);
      return jsonResult({
        days: SOURCE_HEALTH_DAYS,
        sources: summarizeSources(deps.sources, volumes, runs),
      });
    }),
  );
};
