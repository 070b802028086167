// =============================================================================
// @tidewire/server: Article tools: search_articles, get_article
// =============================================================================

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import {
  type Article,
  GetArticleInput,
  SearchArticlesInput,
  withTimeout,
} from "@tidewire/shared";
import { logExternalCall } from "../logger.js";
import type { ToolRegistrar, AppDependencies } from "../server.js";
import { jsonResult, runTool, toolError } from "./respond.js";

/** Article as returned to clients; the embedding is never sent */
export type ArticleView = Omit<Article, "embedding" | "titleNorm">;

export function toArticleView(article: Article): ArticleView {
  const { embedding: _embedding, titleNorm: _titleNorm, ...view } = article;
  return view;
}

export const registerArticleTools: ToolRegistrar = (
  server: McpServer,
  deps: AppDependencies,
) => {
  const { stores, embedder, logger, config } = deps;

  // -------------------------------------------------------------------------
  // search_articles: semantic search over stored article embeddings
  // -------------------------------------------------------------------------
  server.tool("search_articles", SearchArticlesInput.shape, async (input) =>
    runTool(logger, "search_articles", input, async () => {
      const embedStart = performance.now();
      const vector = await withTimeout(
        embedder.embed(input.query, "RETRIEVAL_QUERY"),
        config.EXTERNAL_CALL_TIMEOUT_MS,
        "embed search query",
      );
      logExternalCall(logger, "gemini", "embed_query", performance.now() - embedStart);

      const results = await stores.articles.search(vector, {
        limit: input.limit,
        category: input.category,
        minRelevance: input.min_relevance,
      });

      return jsonResult({
        query: input.query,
        count: results.length,
        results: results.map((r) => ({
          score: Math.round(r.score * 1000) / 1000,
          article: toArticleView(r.article),
        })),
      });
    }),
  );

  // -------------------------------------------------------------------------
  // get_article: by id, falling back to the source-native id
  // -------------------------------------------------------------------------
  server.tool("get_article", GetArticleInput.shape, async (input) =>
    runTool(logger, "get_article", input, async () => {
      const article = await stores.articles.getByAnyId(input.article_id);
      if (!article) {
        return toolError(`Article "${input.article_id}" not found`);
      }
      return jsonResult(toArticleView(article));
    }),
  );
};
