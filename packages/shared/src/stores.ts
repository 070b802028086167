// =============================================================================
// @tidewire/shared: Persistence interfaces
// =============================================================================
// Pipeline code talks to these interfaces only. The Neo4j implementations
// live in ./neo4j; in-memory ones for tests live in ./testing.
// =============================================================================

import type {
  AnalysisRun,
  Article,
  ArticleCandidate,
  ArticleStatus,
  Briefing,
  Category,
  DedupTitle,
  EnqueueInput,
  Enrichment,
  Platform,
  PublishLogEntry,
  PublishQueueItem,
  PublishSettlement,
  PublishStatus,
  RunMode,
  ScrapeRun,
  ScrapeRunStats,
} from "./types.js";

export interface NewArticle {
  candidate: ArticleCandidate;
  scrapedAt: string;
  scrapeRunId: string;
  embedding?: number[];
  semanticUnverified: boolean;
}

export interface VectorNeighbor {
  id: string;
  embedding: number[];
}

export interface ArticleQuery {
  since: string;
  until?: string;
  minRelevance?: number;
  limit?: number;
}

/** Scrape-time window [since, until) */
export interface ScrapeWindow {
  since: string;
  until?: string;
}

export type CategoryCounts = Partial<Record<Category, number>>;

export interface SourceVolume {
  source: string;
  articleCount: number;
  highRelevanceCount: number;
}

export interface ArticleSearchOptions {
  limit: number;
  category?: Category;
  minRelevance?: number;
  excludeIds?: string[];
}

export interface ScoredArticle {
  article: Article;
  score: number;
}

export interface ArticleStore {
  insert(input: NewArticle): Promise<Article>;
  get(id: string): Promise<Article | null>;
  /** Lookup by id, falling back to the source-native id */
  getByAnyId(id: string): Promise<Article | null>;
  /** Nearest stored embeddings scraped at or after `since` */
  nearestNeighbors(
    vector: number[],
    options: { limit: number; since: string },
  ): Promise<VectorNeighbor[]>;
  listPending(limit: number): Promise<Article[]>;
  /** pending -> analyzed with enrichment; no-op for any other status */
  applyEnrichment(id: string, enrichment: Enrichment): Promise<boolean>;
  /**
   * Moves articles forward to `status`. Articles already at or beyond it
   * are left alone. Returns the number changed.
   */
  advanceStatus(ids: string[], status: ArticleStatus): Promise<number>;
  /** Articles scraped in [since, until) with optional relevance floor */
  listScraped(query: ArticleQuery): Promise<Article[]>;
  search(vector: number[], options: ArticleSearchOptions): Promise<ScoredArticle[]>;
  /** Classified articles per category; unclassified ones are not counted */
  countByCategory(window: ScrapeWindow): Promise<CategoryCounts>;
  /** Per-source totals, counting relevance `highRelevance` and up as high */
  volumeBySource(window: ScrapeWindow, highRelevance: number): Promise<SourceVolume[]>;
  countByStatus(): Promise<Partial<Record<ArticleStatus, number>>>;
  /** Advances published/analyzed articles scraped before `cutoff` to archived */
  archiveBefore(cutoff: string): Promise<number>;
}

export interface DedupTitleStore {
  loadRecent(options: { limit: number; since: string }): Promise<DedupTitle[]>;
  /** Whether `titleNorm` was seen at or after `since` */
  has(titleNorm: string, since: string): Promise<boolean>;
  record(entry: DedupTitle): Promise<void>;
  deleteBefore(cutoff: string): Promise<number>;
}

export interface ScrapeRunStore {
  start(mode: RunMode, startedAt: string, triggeredBy?: string): Promise<string>;
  finish(id: string, stats: ScrapeRunStats, finishedAt: string): Promise<void>;
  latest(mode?: RunMode): Promise<ScrapeRun | null>;
  listRecent(limit: number, mode?: RunMode): Promise<ScrapeRun[]>;
}

export interface BriefingStore {
  /** Writes the briefing and its queue items in one transaction */
  insert(briefing: Briefing, queueItems?: EnqueueInput[]): Promise<void>;
  latest(): Promise<Briefing | null>;
  /** Most recent briefing created on the given UTC date (YYYY-MM-DD) */
  forDate(date: string): Promise<Briefing | null>;
}

export interface AnalysisRunStore {
  insert(run: AnalysisRun): Promise<void>;
  listRecent(limit: number): Promise<AnalysisRun[]>;
}

export interface PublishQueueStore {
  enqueue(input: EnqueueInput, createdAt: string): Promise<PublishQueueItem>;
  get(id: string): Promise<PublishQueueItem | null>;
  /**
   * `queued` items plus `retry_queued` items due at `now`, ordered by
   * priority ascending then creation time ascending.
   */
  listEligible(
    now: string,
    options: { platform?: Platform; limit: number },
  ): Promise<PublishQueueItem[]>;
  /**
   * Atomic compare-and-set to `publishing`. Returns the claimed item, or
   * null when another execution context got there first or the item is no
   * longer eligible.
   */
  claim(id: string, now: string): Promise<PublishQueueItem | null>;
  /** Applies a settlement; only succeeds while the item is `publishing` */
  settle(id: string, settlement: PublishSettlement): Promise<boolean>;
  /** Returns an in-flight claim to `retry_queued`, eligible immediately */
  release(id: string, entry: PublishLogEntry): Promise<boolean>;
  /** Releases every `publishing` claim taken before `claimedBefore` */
  reclaimStale(claimedBefore: string, now: string): Promise<number>;
  /** Operator decision: queued/retry_queued -> skipped */
  skip(id: string, reason: string, now: string, operator?: string): Promise<boolean>;
  countByStatus(): Promise<Partial<Record<PublishStatus, number>>>;
  countPublishedSince(since: string): Promise<number>;
}

export interface Stores {
  articles: ArticleStore;
  dedupTitles: DedupTitleStore;
  scrapeRuns: ScrapeRunStore;
  briefings: BriefingStore;
  analysisRuns: AnalysisRunStore;
  publishQueue: PublishQueueStore;
}
