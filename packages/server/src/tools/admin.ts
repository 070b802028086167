// =============================================================================
// @tidewire/server: Admin tools: health_check, get_status
// =============================================================================

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { checkHealth, type ToolRegistrar, type AppDependencies } from "../server.js";
import { jsonResult, runTool } from "./respond.js";

const DAY_MS = 86_400_000;

export const registerAdminTools: ToolRegistrar = (
  server: McpServer,
  deps: AppDependencies,
) => {
  const { stores, logger, clock } = deps;

  // -------------------------------------------------------------------------
  // health_check: parallel Neo4j + Gemini connectivity check
  // -------------------------------------------------------------------------
  server.tool("health_check", {}, async () =>
    runTool(logger, "health_check", {}, async () => jsonResult(await checkHealth(deps))),
  );

  // -------------------------------------------------------------------------
  // get_status: latest runs, article counts, queue depth by status
  // -------------------------------------------------------------------------
  server.tool("get_status", {}, async () =>
    runTool(logger, "get_status", {}, async () => {
      const since = new Date(clock().getTime() - DAY_MS).toISOString();
      const [latestRun, latestScrape, articles, queue, publishedLast24h, analysisRuns] =
        await Promise.all([
          stores.scrapeRuns.latest(),
          stores.scrapeRuns.latest("scrape"),
          stores.articles.countByStatus(),
          stores.publishQueue.countByStatus(),
          stores.publishQueue.countPublishedSince(since),
          stores.analysisRuns.listRecent(1),
        ]);
      const lastAnalysis = analysisRuns[0];
      return jsonResult({
        latestRun,
        latestScrape,
        lastAnalysis: lastAnalysis
          ? {
              id: lastAnalysis.id,
              status: lastAnalysis.status,
              articlesConsumed: lastAnalysis.articlesConsumed,
              briefingId: lastAnalysis.briefingId ?? null,
              createdAt: lastAnalysis.createdAt,
            }
          : null,
        articles,
        queue,
        publishedLast24h,
        configuredPlatforms: Object.keys(deps.adapters).sort(),
      });
    }),
  );
};
