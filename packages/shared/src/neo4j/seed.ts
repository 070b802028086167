// =============================================================================
// @tidewire/shared: Idempotent Neo4j schema setup
// =============================================================================
// Uniqueness constraints on ids, lookup indexes for the hot filters, and the
// cosine vector index on Article embeddings. Every statement is
// IF NOT EXISTS, so it is safe to run on every deploy.
// =============================================================================

import { int, type Driver } from "./driver.js";
import { ARTICLE_VECTOR_INDEX } from "./articles.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SeedResult {
  constraints: number;
  indexes: number;
  vectorIndexes: number;
}

export interface SeedLogger {
  info: (msg: string) => void;
}

const UNIQUE_IDS = [
  "Article",
  "ScrapeRun",
  "Briefing",
  "AnalysisRun",
  "PublishQueueItem",
] as const;

const LOOKUP_INDEXES: Array<{ name: string; label: string; property: string }> = [
  { name: "article_status", label: "Article", property: "status" },
  { name: "article_scraped_at", label: "Article", property: "scraped_at" },
  { name: "article_source_id", label: "Article", property: "source_id" },
  { name: "dedup_title_seen_at", label: "DedupTitle", property: "seen_at" },
  { name: "dedup_title_norm", label: "DedupTitle", property: "title_norm" },
  { name: "queue_status", label: "PublishQueueItem", property: "status" },
  { name: "briefing_created_at", label: "Briefing", property: "created_at" },
  { name: "scrape_run_started_at", label: "ScrapeRun", property: "started_at" },
];

// ---------------------------------------------------------------------------
// Seed Logic
// ---------------------------------------------------------------------------

/**
 * Creates constraints and indexes. `dimensions` must match the embedding
 * model's output size.
 */
export async function seedDatabase(
  driver: Driver,
  options: { dimensions: number },
  logger: SeedLogger = console,
): Promise<SeedResult> {
  const result: SeedResult = { constraints: 0, indexes: 0, vectorIndexes: 0 };
  const session = driver.session();

  try {
    logger.info("Creating uniqueness constraints...");
    for (const label of UNIQUE_IDS) {
      await session.executeWrite((tx) =>
        tx.run(
          `CREATE CONSTRAINT ${label.toLowerCase()}_id IF NOT EXISTS
           FOR (n:${label}) REQUIRE n.id IS UNIQUE`,
        ),
      );
      result.constraints++;
    }

    logger.info("Creating lookup indexes...");
    for (const index of LOOKUP_INDEXES) {
      await session.executeWrite((tx) =>
        tx.run(
          `CREATE INDEX ${index.name} IF NOT EXISTS
           FOR (n:${index.label}) ON (n.${index.property})`,
        ),
      );
      result.indexes++;
    }

    logger.info("Creating vector index (if not exists)...");
    await session.executeWrite((tx) =>
      tx.run(
        `CREATE VECTOR INDEX ${ARTICLE_VECTOR_INDEX} IF NOT EXISTS
         FOR (n:Article) ON (n.embedding)
         OPTIONS { indexConfig: {
           \`vector.dimensions\`: $dimensions,
           \`vector.similarity_function\`: 'cosine'
         }}`,
        { dimensions: int(options.dimensions) },
      ),
    );
    result.vectorIndexes++;

    logger.info(
      `Seed complete: ${result.constraints} constraints, ${result.indexes} indexes, vector index "${ARTICLE_VECTOR_INDEX}"`,
    );
    return result;
  } finally {
    await session.close();
  }
}
