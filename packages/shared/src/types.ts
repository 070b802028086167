// =============================================================================
// @tidewire/shared: Domain types for articles, analysis and publishing
// =============================================================================
// Covers the persisted entities (Article, DedupTitle, ScrapeRun, Briefing,
// AnalysisRun, PublishQueueItem), the ephemeral SignalThread, and the closed
// enumerations that LLM output is validated against.
// =============================================================================

// ---------------------------------------------------------------------------
// Enums & Union Types
// ---------------------------------------------------------------------------

/** Closed category set assigned by stage 1 classification */
export const CATEGORIES = [
  "funding",
  "m_and_a",
  "investment",
  "product",
  "regulation",
  "breakthrough",
  "research",
  "open_source",
  "partnership",
  "adoption",
  "personnel",
  "market",
  "other",
] as const;
export type Category = (typeof CATEGORIES)[number];

/** Article lifecycle; transitions only move forward */
export const ARTICLE_STATUSES = [
  "pending",
  "analyzed",
  "published",
  "archived",
] as const;
export type ArticleStatus = (typeof ARTICLE_STATUSES)[number];

export const URGENCIES = ["high", "medium", "low"] as const;
export type Urgency = (typeof URGENCIES)[number];

/** Numeric drain priority; 1 drains first */
export const URGENCY_PRIORITY: Record<Urgency, number> = {
  high: 1,
  medium: 2,
  low: 3,
};

export const PUBLISH_STATUSES = [
  "queued",
  "publishing",
  "published",
  "retry_queued",
  "failed",
  "skipped",
] as const;
export type PublishStatus = (typeof PUBLISH_STATUSES)[number];

export const PLATFORMS = ["devto", "hashnode", "medium", "linkedin"] as const;
export type Platform = (typeof PLATFORMS)[number];

/** Platforms that take long-form articles; the rest take short posts */
export const LONG_FORM_PLATFORMS: ReadonlySet<Platform> = new Set([
  "devto",
  "hashnode",
  "medium",
]);

export type RunMode = "scrape" | "analyze" | "publish" | "cycle";

export type ConfidenceTier = "high" | "medium" | "single-source";

export type Momentum = "rising" | "stable" | "declining";

// ---------------------------------------------------------------------------
// Result
// ---------------------------------------------------------------------------

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

// ---------------------------------------------------------------------------
// Ingestion
// ---------------------------------------------------------------------------

/** A record as returned by a source fetcher, before normalization */
export interface RawRecord {
  source: string;
  title: string;
  body?: string;
  url?: string;
  externalId?: string;
  publishedAt?: string;
}

/** Normalized article shape awaiting the dedup decision */
export interface ArticleCandidate {
  source: string;
  sourceId: string;
  url?: string;
  title: string;
  titleNorm: string;
  body: string;
  publishedAt?: string;
}

export interface Enrichment {
  englishTitle: string;
  category: Category;
  relevance: number;
}

export interface Article extends ArticleCandidate {
  id: string;
  scrapedAt: string;
  status: ArticleStatus;
  englishTitle?: string;
  category?: Category;
  relevance?: number;
  embedding?: number[];
  /** Set when the semantic check could not run at ingestion */
  semanticUnverified: boolean;
  scrapeRunId?: string;
}

export interface DedupTitle {
  titleNorm: string;
  source: string;
  seenAt: string;
}

export interface ScrapeRun {
  id: string;
  mode: RunMode;
  /** API client that started the run, or "scheduler" */
  triggeredBy?: string;
  startedAt: string;
  finishedAt?: string;
  durationS?: number;
  articlesFound: number;
  articlesNew: number;
  sourcesOk: string[];
  sourcesFailed: string[];
  error?: string;
}

export interface ScrapeRunStats {
  articlesFound: number;
  articlesNew: number;
  sourcesOk: string[];
  sourcesFailed: string[];
  error?: string;
}

// ---------------------------------------------------------------------------
// Analysis
// ---------------------------------------------------------------------------

export interface BriefingSections {
  lead: string;
  patterns: string;
  signals: string;
  watchlist: string[];
  data: string[];
}

export interface Briefing {
  id: string;
  sections: BriefingSections;
  text: string;
  articleCount: number;
  modelUsed: string;
  analysisRunId: string;
  createdAt: string;
}

export interface PostDraft {
  articleId: string;
  urgency: Urgency;
  title: string;
  longForm: string;
  shortForm: string;
}

export type AnalysisRunStatus = "completed" | "failed" | "skipped";

/** One execution of the two-stage pipeline; written once, never updated */
export interface AnalysisRun {
  id: string;
  model: string;
  inputArticleIds: string[];
  articlesConsumed: number;
  briefingId?: string;
  briefingText?: string;
  status: AnalysisRunStatus;
  errors: string[];
  createdAt: string;
}

// ---------------------------------------------------------------------------
// Signals
// ---------------------------------------------------------------------------

export interface SignalArticle {
  id: string;
  source: string;
  englishTitle: string;
  relevance: number;
  publishedAt?: string;
}

export interface SignalThread {
  id: string;
  theme: string;
  category: Category;
  articleIds: string[];
  sources: string[];
  sourceCount: number;
  confidence: ConfidenceTier;
  articles: SignalArticle[];
}

export interface CategoryMomentum {
  category: Category;
  current: number;
  previous: number;
  /** Percentage change; null when the prior window is empty */
  changePct: number | null;
  momentum: Momentum;
}

// ---------------------------------------------------------------------------
// Publishing
// ---------------------------------------------------------------------------

export type PublishLogOutcome =
  | "published"
  | "failed"
  | "released"
  | "reclaimed"
  | "skipped";

export interface PublishLogEntry {
  at: string;
  outcome: PublishLogOutcome;
  platformId?: string;
  error?: string;
  retryable?: boolean;
  fallbackUsed?: boolean;
  /** Error of the full-body attempt when the fallback body was published */
  primaryError?: string;
  /** Client that made an operator decision such as a skip */
  operator?: string;
}

export interface PublishQueueItem {
  id: string;
  platform: Platform;
  title?: string;
  body: string;
  fallbackBody?: string;
  urgency: Urgency;
  priority: number;
  language: string;
  status: PublishStatus;
  retryCount: number;
  maxRetries: number;
  /** null means eligible immediately */
  nextRetryAt: string | null;
  publishLog: PublishLogEntry[];
  publishedAt?: string;
  platformId?: string;
  error?: string;
  briefingId?: string;
  articleId?: string;
  claimedAt?: string;
  createdAt: string;
}

export interface EnqueueInput {
  platform: Platform;
  title?: string;
  body: string;
  fallbackBody?: string;
  urgency: Urgency;
  language?: string;
  maxRetries: number;
  briefingId?: string;
  articleId?: string;
}

/** Terminal or retry state written when a claimed attempt settles */
export interface PublishSettlement {
  status: "published" | "retry_queued" | "failed";
  retryCount: number;
  nextRetryAt: string | null;
  logEntry: PublishLogEntry;
  platformId?: string;
  publishedAt?: string;
  error?: string;
}
