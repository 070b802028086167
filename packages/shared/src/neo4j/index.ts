import type { Stores } from "../stores.js";
import { Neo4jArticleStore } from "./articles.js";
import type { Driver } from "./driver.js";
import { Neo4jPublishQueueStore } from "./publish-queue.js";
import {
  Neo4jAnalysisRunStore,
  Neo4jBriefingStore,
  Neo4jDedupTitleStore,
  Neo4jScrapeRunStore,
} from "./runs.js";

export { createDriver, healthCheck, closeDriver, withSession, toNumber } from "./driver.js";
export type { Driver, Session, HealthCheckResult } from "./driver.js";

export { seedDatabase } from "./seed.js";
export type { SeedResult, SeedLogger } from "./seed.js";

export { ARTICLE_VECTOR_INDEX, Neo4jArticleStore } from "./articles.js";
export { Neo4jPublishQueueStore } from "./publish-queue.js";
export {
  Neo4jAnalysisRunStore,
  Neo4jBriefingStore,
  Neo4jDedupTitleStore,
  Neo4jScrapeRunStore,
} from "./runs.js";

export function createNeo4jStores(driver: Driver): Stores {
  return {
    articles: new Neo4jArticleStore(driver),
    dedupTitles: new Neo4jDedupTitleStore(driver),
    scrapeRuns: new Neo4jScrapeRunStore(driver),
    briefings: new Neo4jBriefingStore(driver),
    analysisRuns: new Neo4jAnalysisRunStore(driver),
    publishQueue: new Neo4jPublishQueueStore(driver),
  };
}
