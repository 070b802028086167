// =============================================================================
// @tidewire/shared: Article nodes
// =============================================================================
// Vector queries go through the `article_embedding` index. Its score is
// (1 + cosine) / 2, so callers that need the real cosine either convert it
// (search) or recompute it from the returned embeddings (dedup).
// =============================================================================

import type {
  ArticleQuery,
  ArticleSearchOptions,
  ArticleStore,
  CategoryCounts,
  NewArticle,
  ScoredArticle,
  ScrapeWindow,
  SourceVolume,
  VectorNeighbor,
} from "../stores.js";
import {
  ARTICLE_STATUSES,
  CATEGORIES,
  type Article,
  type ArticleStatus,
  type Enrichment,
} from "../types.js";
import {
  asEnum,
  asOptionalEnum,
  asOptionalString,
  asString,
  asVector,
  int,
  nodeProperties,
  toNumber,
  withSession,
  type Driver,
} from "./driver.js";

export const ARTICLE_VECTOR_INDEX = "article_embedding";

/** Candidates fetched from the index per wanted result, before filtering */
const VECTOR_OVERSAMPLE = 4;

export function toArticle(props: Record<string, unknown>): Article {
  const relevance = props.relevance;
  return {
    id: asString(props.id),
    source: asString(props.source),
    sourceId: asString(props.source_id),
    url: asOptionalString(props.url),
    title: asString(props.title),
    titleNorm: asString(props.title_norm),
    body: asString(props.body),
    publishedAt: asOptionalString(props.published_at),
    scrapedAt: asString(props.scraped_at),
    status: asEnum(ARTICLE_STATUSES, props.status, "pending"),
    englishTitle: asOptionalString(props.english_title),
    category: asOptionalEnum(CATEGORIES, props.category),
    relevance: relevance === null || relevance === undefined ? undefined : toNumber(relevance),
    embedding: asVector(props.embedding),
    semanticUnverified: props.semantic_unverified === true,
    scrapeRunId: asOptionalString(props.scrape_run_id),
  };
}

/** Statuses an article may be advanced from to reach `status` */
export function statusesBefore(status: ArticleStatus): ArticleStatus[] {
  return ARTICLE_STATUSES.slice(0, ARTICLE_STATUSES.indexOf(status));
}

export class Neo4jArticleStore implements ArticleStore {
  constructor(private readonly driver: Driver) {}

  async insert(input: NewArticle): Promise<Article> {
    const { candidate } = input;
    return withSession(this.driver, "insert article", async (session) => {
      const result = await session.executeWrite((tx) =>
        tx.run(
          `CREATE (a:Article {
             id: randomUUID(),
             source: $source,
             source_id: $sourceId,
             url: $url,
             title: $title,
             title_norm: $titleNorm,
             body: $body,
             published_at: $publishedAt,
             scraped_at: $scrapedAt,
             status: 'pending',
             embedding: $embedding,
             semantic_unverified: $semanticUnverified,
             scrape_run_id: $scrapeRunId
           })
           RETURN a`,
          {
            source: candidate.source,
            sourceId: candidate.sourceId,
            url: candidate.url ?? null,
            title: candidate.title,
            titleNorm: candidate.titleNorm,
            body: candidate.body,
            publishedAt: candidate.publishedAt ?? null,
            scrapedAt: input.scrapedAt,
            embedding: input.embedding ?? null,
            semanticUnverified: input.semanticUnverified,
            scrapeRunId: input.scrapeRunId,
          },
        ),
      );
      return toArticle(nodeProperties(result.records[0], "a"));
    });
  }

  async get(id: string): Promise<Article | null> {
    return withSession(this.driver, "get article", async (session) => {
      const result = await session.executeRead((tx) =>
        tx.run(`MATCH (a:Article {id: $id}) RETURN a`, { id }),
      );
      const record = result.records[0];
      return record ? toArticle(nodeProperties(record, "a")) : null;
    });
  }

  async getByAnyId(id: string): Promise<Article | null> {
    return withSession(this.driver, "get article by any id", async (session) => {
      const result = await session.executeRead((tx) =>
        tx.run(
          `MATCH (a:Article)
           WHERE a.id = $id OR a.source_id = $id
           RETURN a
           ORDER BY CASE WHEN a.id = $id THEN 0 ELSE 1 END, a.scraped_at DESC
           LIMIT 1`,
          { id },
        ),
      );
      const record = result.records[0];
      return record ? toArticle(nodeProperties(record, "a")) : null;
    });
  }

  async nearestNeighbors(
    vector: number[],
    options: { limit: number; since: string },
  ): Promise<VectorNeighbor[]> {
    return withSession(this.driver, "nearest neighbors", async (session) => {
      const result = await session.executeRead((tx) =>
        tx.run(
          `CALL db.index.vector.queryNodes($index, $k, $vector)
           YIELD node, score
           WHERE node.scraped_at >= $since
           RETURN node.id AS id, node.embedding AS embedding
           ORDER BY score DESC
           LIMIT $limit`,
          {
            index: ARTICLE_VECTOR_INDEX,
            k: int(options.limit * VECTOR_OVERSAMPLE),
            vector,
            since: options.since,
            limit: int(options.limit),
          },
        ),
      );
      const neighbors: VectorNeighbor[] = [];
      for (const record of result.records) {
        const embedding = asVector(record.get("embedding"));
        if (embedding) neighbors.push({ id: asString(record.get("id")), embedding });
      }
      return neighbors;
    });
  }

  async listPending(limit: number): Promise<Article[]> {
    return withSession(this.driver, "list pending", async (session) => {
      const result = await session.executeRead((tx) =>
        tx.run(
          `MATCH (a:Article {status: 'pending'})
           RETURN a
           ORDER BY a.scraped_at ASC
           LIMIT $limit`,
          { limit: int(limit) },
        ),
      );
      return result.records.map((r) => toArticle(nodeProperties(r, "a")));
    });
  }

  async applyEnrichment(id: string, enrichment: Enrichment): Promise<boolean> {
    return withSession(this.driver, "apply enrichment", async (session) => {
      const result = await session.executeWrite((tx) =>
        tx.run(
          `MATCH (a:Article {id: $id})
           WHERE a.status = 'pending'
           SET a.english_title = $englishTitle,
               a.category = $category,
               a.relevance = $relevance,
               a.status = 'analyzed'
           RETURN count(a) AS n`,
          {
            id,
            englishTitle: enrichment.englishTitle,
            category: enrichment.category,
            relevance: int(enrichment.relevance),
          },
        ),
      );
      return toNumber(result.records[0]?.get("n")) > 0;
    });
  }

  async advanceStatus(ids: string[], status: ArticleStatus): Promise<number> {
    const from = statusesBefore(status);
    if (ids.length === 0 || from.length === 0) return 0;
    return withSession(this.driver, "advance status", async (session) => {
      const result = await session.executeWrite((tx) =>
        tx.run(
          `UNWIND $ids AS id
           MATCH (a:Article {id: id})
           WHERE a.status IN $from
           SET a.status = $status
           RETURN count(a) AS n`,
          { ids, from, status },
        ),
      );
      return toNumber(result.records[0]?.get("n"));
    });
  }

  async listScraped(query: ArticleQuery): Promise<Article[]> {
    return withSession(this.driver, "list scraped", async (session) => {
      const result = await session.executeRead((tx) =>
        tx.run(
          `MATCH (a:Article)
           WHERE a.scraped_at >= $since
             AND ($until IS NULL OR a.scraped_at < $until)
             AND ($minRelevance IS NULL OR a.relevance >= $minRelevance)
           RETURN a
           ORDER BY a.scraped_at DESC
           LIMIT $limit`,
          {
            since: query.since,
            until: query.until ?? null,
            minRelevance: query.minRelevance === undefined ? null : int(query.minRelevance),
            limit: int(query.limit ?? 1000),
          },
        ),
      );
      return result.records.map((r) => toArticle(nodeProperties(r, "a")));
    });
  }

  async search(vector: number[], options: ArticleSearchOptions): Promise<ScoredArticle[]> {
    const excludeIds = options.excludeIds ?? [];
    return withSession(this.driver, "search articles", async (session) => {
      const result = await session.executeRead((tx) =>
        tx.run(
          `CALL db.index.vector.queryNodes($index, $k, $vector)
           YIELD node, score
           WHERE NOT node.id IN $excludeIds
             AND ($category IS NULL OR node.category = $category)
             AND ($minRelevance IS NULL OR node.relevance >= $minRelevance)
           RETURN node, score
           ORDER BY score DESC
           LIMIT $limit`,
          {
            index: ARTICLE_VECTOR_INDEX,
            k: int(options.limit * VECTOR_OVERSAMPLE + excludeIds.length),
            vector,
            excludeIds,
            category: options.category ?? null,
            minRelevance: options.minRelevance === undefined ? null : int(options.minRelevance),
            limit: int(options.limit),
          },
        ),
      );
      return result.records.map((r) => ({
        article: toArticle(nodeProperties(r, "node")),
        score: 2 * toNumber(r.get("score")) - 1,
      }));
    });
  }

  async countByCategory(window: ScrapeWindow): Promise<CategoryCounts> {
    return withSession(this.driver, "count by category", async (session) => {
      const result = await session.executeRead((tx) =>
        tx.run(
          `MATCH (a:Article)
           WHERE a.scraped_at >= $since
             AND ($until IS NULL OR a.scraped_at < $until)
             AND a.category IS NOT NULL
           RETURN a.category AS category, count(*) AS n`,
          { since: window.since, until: window.until ?? null },
        ),
      );
      const counts: CategoryCounts = {};
      for (const record of result.records) {
        const category = asOptionalEnum(CATEGORIES, record.get("category"));
        if (category === undefined) continue;
        counts[category] = (counts[category] ?? 0) + toNumber(record.get("n"));
      }
      return counts;
    });
  }

  async volumeBySource(window: ScrapeWindow, highRelevance: number): Promise<SourceVolume[]> {
    return withSession(this.driver, "volume by source", async (session) => {
      const result = await session.executeRead((tx) =>
        tx.run(
          `MATCH (a:Article)
           WHERE a.scraped_at >= $since
             AND ($until IS NULL OR a.scraped_at < $until)
           RETURN a.source AS source,
                  count(*) AS n,
                  count(CASE WHEN a.relevance >= $high THEN 1 END) AS high`,
          { since: window.since, until: window.until ?? null, high: int(highRelevance) },
        ),
      );
      return result.records.map((r) => ({
        source: asString(r.get("source")),
        articleCount: toNumber(r.get("n")),
        highRelevanceCount: toNumber(r.get("high")),
      }));
    });
  }

  async countByStatus(): Promise<Partial<Record<ArticleStatus, number>>> {
    return withSession(this.driver, "count articles", async (session) => {
      const result = await session.executeRead((tx) =>
        tx.run(`MATCH (a:Article) RETURN a.status AS status, count(*) AS n`),
      );
      const counts: Partial<Record<ArticleStatus, number>> = {};
      for (const record of result.records) {
        const status = asEnum(ARTICLE_STATUSES, record.get("status"), "pending");
        counts[status] = (counts[status] ?? 0) + toNumber(record.get("n"));
      }
      return counts;
    });
  }

  async archiveBefore(cutoff: string): Promise<number> {
    return withSession(this.driver, "archive articles", async (session) => {
      const result = await session.executeWrite((tx) =>
        tx.run(
          `MATCH (a:Article)
           WHERE a.scraped_at < $cutoff AND a.status IN ['analyzed', 'published']
           SET a.status = 'archived'
           RETURN count(a) AS n`,
          { cutoff },
        ),
      );
      return toNumber(result.records[0]?.get("n"));
    });
  }
}
