// =============================================================================
// @tidewire/shared: Signal thread clustering
// =============================================================================
// Greedy single pass: articles are taken in relevance-descending,
// recency-descending order, and each joins the nearest same-category thread
// or starts a new one. Similarity is cosine to the thread's running centroid
// when both sides have an embedding, otherwise keyword overlap with the
// thread's widened keyword set.
// =============================================================================

import type {
  Article,
  Category,
  ConfidenceTier,
  SignalArticle,
  SignalThread,
} from "../types.js";
import { cosineSimilarity, updateCentroid } from "../vectors.js";

export const DEFAULT_CLUSTER_THRESHOLD = 0.7;
const MIN_SHARED_KEYWORDS = 2;
const THEME_MAX_CHARS = 80;

const STOP_WORDS = new Set([
  "the", "and", "for", "with", "from", "its", "has", "new", "says", "will",
  "than", "more", "about", "into", "over", "are", "was", "were", "this",
  "that", "after", "amid", "how", "why", "what", "who", "now", "out", "can",
  "but", "not", "all", "you", "your", "our", "their",
]);

const TIER_RANK: Record<ConfidenceTier, number> = {
  high: 0,
  medium: 1,
  "single-source": 2,
};

export function confidenceTier(sourceCount: number): ConfidenceTier {
  if (sourceCount >= 3) return "high";
  if (sourceCount === 2) return "medium";
  return "single-source";
}

/** Lowercase words of three or more letters, minus stop words */
export function titleKeywords(title: string): Set<string> {
  const words = title.toLowerCase().match(/\p{L}{3,}/gu) ?? [];
  return new Set(words.filter((w) => !STOP_WORDS.has(w)));
}

interface WorkingThread {
  category: Category;
  members: Article[];
  centroid: number[] | null;
  embeddedCount: number;
  keywords: Set<string>;
}

type Match = { thread: WorkingThread; byVector: boolean; score: number };

function displayTitle(a: Article): string {
  return a.englishTitle ?? a.title;
}

function recency(a: Article): string {
  return a.publishedAt ?? a.scrapedAt;
}

function compareForClustering(a: Article, b: Article): number {
  return (
    (b.relevance ?? 0) - (a.relevance ?? 0) ||
    recency(b).localeCompare(recency(a)) ||
    a.id.localeCompare(b.id)
  );
}

function matchThread(
  article: Article,
  keywords: Set<string>,
  thread: WorkingThread,
  threshold: number,
): Match | null {
  if (article.embedding && thread.centroid) {
    const score = cosineSimilarity(article.embedding, thread.centroid);
    return score >= threshold ? { thread, byVector: true, score } : null;
  }
  let shared = 0;
  for (const word of keywords) if (thread.keywords.has(word)) shared++;
  return shared >= MIN_SHARED_KEYWORDS ? { thread, byVector: false, score: shared } : null;
}

/** Vector matches outrank keyword matches; the earlier thread wins a tie */
function isNearer(candidate: Match, best: Match | null): boolean {
  if (best === null) return true;
  if (candidate.byVector !== best.byVector) return candidate.byVector;
  return candidate.score > best.score;
}

function toSignalArticle(a: Article): SignalArticle {
  return {
    id: a.id,
    source: a.source,
    englishTitle: displayTitle(a),
    relevance: a.relevance ?? 0,
    publishedAt: a.publishedAt,
  };
}

function finalize(thread: WorkingThread): SignalThread {
  const sources: string[] = [];
  for (const m of thread.members) {
    if (!sources.includes(m.source)) sources.push(m.source);
  }
  const first = thread.members[0];
  return {
    id: first.id,
    theme: displayTitle(first).slice(0, THEME_MAX_CHARS),
    category: thread.category,
    articleIds: thread.members.map((m) => m.id),
    sources,
    sourceCount: sources.length,
    confidence: confidenceTier(sources.length),
    articles: thread.members.map(toSignalArticle),
  };
}

function maxRelevance(thread: SignalThread): number {
  return Math.max(...thread.articles.map((a) => a.relevance));
}

export function clusterSignals(
  articles: Article[],
  threshold: number = DEFAULT_CLUSTER_THRESHOLD,
): SignalThread[] {
  const threads: WorkingThread[] = [];

  for (const article of [...articles].sort(compareForClustering)) {
    const category = article.category ?? "other";
    const keywords = titleKeywords(displayTitle(article));

    let best: Match | null = null;
    for (const thread of threads) {
      if (thread.category !== category) continue;
      const match = matchThread(article, keywords, thread, threshold);
      if (match && isNearer(match, best)) best = match;
    }

    if (!best) {
      threads.push({
        category,
        members: [article],
        centroid: article.embedding ? [...article.embedding] : null,
        embeddedCount: article.embedding ? 1 : 0,
        keywords,
      });
      continue;
    }

    const thread = best.thread;
    thread.members.push(article);
    for (const word of keywords) thread.keywords.add(word);
    if (article.embedding) {
      thread.centroid = thread.centroid
        ? updateCentroid(thread.centroid, thread.embeddedCount, article.embedding)
        : [...article.embedding];
      thread.embeddedCount++;
    }
  }

  return threads
    .map(finalize)
    .sort(
      (a, b) =>
        TIER_RANK[a.confidence] - TIER_RANK[b.confidence] ||
        b.articleIds.length - a.articleIds.length ||
        maxRelevance(b) - maxRelevance(a) ||
        a.theme.localeCompare(b.theme),
    );
}
