// =============================================================================
// @tidewire/shared: Exact + semantic deduplication
// =============================================================================
// accept(candidate) runs the exact check against the rolling title window
// (and, on a miss, the persisted titles of the same age), then, only for
// survivors, the semantic check against stored embeddings and against
// everything accepted earlier in the same run. Accepted candidates are
// recorded in the window and persisted as `pending` articles.
//
// Candidates must be fed in processing order: the second of two duplicates
// in one batch is the one rejected.
// =============================================================================

import type { Article, ArticleCandidate } from "../types.js";
import type { ArticleStore, DedupTitleStore, VectorNeighbor } from "../stores.js";
import type { Embedder } from "../embeddings/index.js";
import type { Logger } from "../logger.js";
import { DedupAmbiguousError, errorMessage } from "../errors.js";
import { withTimeout } from "../timeout.js";
import { cosineSimilarity, embeddingText } from "../vectors.js";
import { DedupWindow } from "./dedup-window.js";

const DAY_MS = 86_400_000;

export type DedupOutcome =
  | { kind: "accepted"; article: Article; semanticUnverified: boolean }
  | { kind: "rejected-exact"; titleNorm: string }
  | { kind: "rejected-semantic"; matchId: string; similarity: number };

export interface DeduplicatorOptions {
  /** Cosine similarity at or above which a candidate is a duplicate */
  semanticThreshold: number;
  /** How far back stored embeddings are compared */
  semanticWindowDays: number;
  windowCapacity: number;
  windowDays: number;
  embedTimeoutMs: number;
  neighborLimit?: number;
}

export interface DeduplicatorDeps {
  articles: ArticleStore;
  dedupTitles: DedupTitleStore;
  embedder: Embedder;
  logger: Logger;
}

interface SemanticMatch {
  id: string;
  similarity: number;
}

export class Deduplicator {
  private readonly acceptedThisRun: VectorNeighbor[] = [];

  private constructor(
    private readonly deps: DeduplicatorDeps,
    private readonly window: DedupWindow,
    private readonly options: DeduplicatorOptions,
    private readonly scrapeRunId: string,
  ) {}

  /** Loads the persisted title window and returns a ready deduplicator */
  static async open(
    deps: DeduplicatorDeps,
    options: DeduplicatorOptions,
    scrapeRunId: string,
    now: Date = new Date(),
  ): Promise<Deduplicator> {
    const windowOptions = {
      capacity: options.windowCapacity,
      maxAgeMs: options.windowDays * DAY_MS,
    };
    const rows = await deps.dedupTitles.loadRecent({
      limit: options.windowCapacity,
      since: new Date(now.getTime() - windowOptions.maxAgeMs).toISOString(),
    });
    const window = DedupWindow.fromEntries(rows, windowOptions, now);
    return new Deduplicator(deps, window, options, scrapeRunId);
  }

  async accept(
    candidate: ArticleCandidate,
    now: Date = new Date(),
  ): Promise<DedupOutcome> {
    if (await this.seenBefore(candidate.titleNorm, now)) {
      return { kind: "rejected-exact", titleNorm: candidate.titleNorm };
    }

    const embedding = await this.tryEmbed(candidate);

    if (embedding) {
      const match = await this.nearestMatch(embedding, now);
      if (match && match.similarity >= this.options.semanticThreshold) {
        this.deps.logger.debug("Semantic duplicate rejected", {
          title: candidate.title.slice(0, 80),
          matchId: match.id,
          similarity: match.similarity,
        });
        return {
          kind: "rejected-semantic",
          matchId: match.id,
          similarity: match.similarity,
        };
      }
    }

    const semanticUnverified = embedding === null;
    const scrapedAt = now.toISOString();

    this.window.add(candidate.titleNorm, candidate.source, now);
    const article = await this.deps.articles.insert({
      candidate,
      scrapedAt,
      scrapeRunId: this.scrapeRunId,
      embedding: embedding ?? undefined,
      semanticUnverified,
    });
    await this.deps.dedupTitles.record({
      titleNorm: candidate.titleNorm,
      source: candidate.source,
      seenAt: scrapedAt,
    });

    if (embedding) {
      this.acceptedThisRun.push({ id: article.id, embedding });
    }

    return { kind: "accepted", article, semanticUnverified };
  }

  /** The window keeps only the newest titles; older ones within its age are still stored */
  private async seenBefore(titleNorm: string, now: Date): Promise<boolean> {
    if (this.window.has(titleNorm, now)) return true;
    const since = new Date(now.getTime() - this.options.windowDays * DAY_MS).toISOString();
    return this.deps.dedupTitles.has(titleNorm, since);
  }

  private async tryEmbed(candidate: ArticleCandidate): Promise<number[] | null> {
    try {
      return await withTimeout(
        this.deps.embedder.embed(
          embeddingText(candidate.title, candidate.body),
          "RETRIEVAL_DOCUMENT",
        ),
        this.options.embedTimeoutMs,
        "embed article",
      );
    } catch (error) {
      const ambiguous = new DedupAmbiguousError(
        `Embedding unavailable, accepting on exact check only: ${errorMessage(error)}`,
        { cause: error },
      );
      this.deps.logger.warn(ambiguous.message, {
        title: candidate.title.slice(0, 80),
        source: candidate.source,
      });
      return null;
    }
  }

  /** Highest-similarity neighbor; the first seen wins a tie */
  private async nearestMatch(
    embedding: number[],
    now: Date,
  ): Promise<SemanticMatch | null> {
    const since = new Date(
      now.getTime() - this.options.semanticWindowDays * DAY_MS,
    ).toISOString();
    const stored = await this.deps.articles.nearestNeighbors(embedding, {
      limit: this.options.neighborLimit ?? 5,
      since,
    });

    let best: SemanticMatch | null = null;
    for (const neighbor of [...stored, ...this.acceptedThisRun]) {
      const similarity = cosineSimilarity(embedding, neighbor.embedding);
      if (best === null || similarity > best.similarity) {
        best = { id: neighbor.id, similarity };
      }
    }
    return best;
  }
}
