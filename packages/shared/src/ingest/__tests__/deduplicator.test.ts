import { describe, it, expect, beforeEach } from "vitest";
import {
  FakeEmbedder,
  createMemoryStores,
  makeArticle,
  type MemoryStores,
} from "../../testing/index.js";
import { silentLogger } from "../../logger.js";
import { Deduplicator, type DeduplicatorOptions } from "../deduplicator.js";
import { normalizeRecord } from "../normalize.js";
import type { ArticleCandidate } from "../../types.js";

const NOW = new Date("2026-01-10T06:00:00.000Z");
const DAY_MS = 86_400_000;

const OPTIONS: DeduplicatorOptions = {
  semanticThreshold: 0.85,
  semanticWindowDays: 30,
  windowCapacity: 500,
  windowDays: 30,
  embedTimeoutMs: 1000,
};

// |v| = 20 for the 5-d vectors, so cosine to BASE is exactly x / 20
const BASE = [1, 0, 0, 0, 0];
const AT_THRESHOLD = [17, 9, 5, 2, 1]; // 17 / 20 = 0.85
const BELOW_THRESHOLD = [16, 12, 0, 0, 0]; // 16 / 20 = 0.8
const ORTHOGONAL = [0, 1, 0, 0, 0];

function candidate(title: string, source = "feed"): ArticleCandidate {
  const c = normalizeRecord({ source, title });
  if (!c) throw new Error(`"${title}" does not normalize`);
  return c;
}

describe("Deduplicator", () => {
  let stores: MemoryStores;
  let embedder: FakeEmbedder;

  async function open(): Promise<Deduplicator> {
    return Deduplicator.open(
      { articles: stores.articles, dedupTitles: stores.dedupTitles, embedder, logger: silentLogger },
      OPTIONS,
      "run-1",
      NOW,
    );
  }

  beforeEach(() => {
    stores = createMemoryStores();
    embedder = new FakeEmbedder([
      ["Chip shortage", BASE],
      ["Chip supply squeeze", AT_THRESHOLD],
      ["Chip makers expand", BELOW_THRESHOLD],
      ["Robotics", ORTHOGONAL],
    ]);
  });

  it("rejects an exact duplicate within the same run without embedding it", async () => {
    const dedup = await open();

    const first = await dedup.accept(candidate("Chip shortage deepens"), NOW);
    const second = await dedup.accept(candidate("CHIP SHORTAGE, deepens!"), NOW);

    expect(first.kind).toBe("accepted");
    expect(second).toEqual({ kind: "rejected-exact", titleNorm: "chip shortage deepens" });
    expect(embedder.calls).toHaveLength(1);
    expect(stores.articles.rows.size).toBe(1);
    expect(stores.dedupTitles.rows).toEqual([
      { titleNorm: "chip shortage deepens", source: "feed", seenAt: NOW.toISOString() },
    ]);
  });

  it("rejects titles already in the persisted window", async () => {
    await stores.dedupTitles.record({
      titleNorm: "chip shortage deepens",
      source: "other-feed",
      seenAt: new Date(NOW.getTime() - DAY_MS).toISOString(),
    });
    const dedup = await open();

    const outcome = await dedup.accept(candidate("Chip shortage deepens"), NOW);

    expect(outcome.kind).toBe("rejected-exact");
  });

  it("finds stored titles that no longer fit the in-memory window", async () => {
    const titles = ["chip shortage deepens", "robotics startup raises", "fab opens"];
    titles.forEach((titleNorm, i) =>
      stores.dedupTitles.rows.push({
        titleNorm,
        source: "feed",
        seenAt: new Date(NOW.getTime() - (3 - i) * DAY_MS).toISOString(),
      }),
    );
    embedder = new FakeEmbedder([], null, ["Chip"]);
    const dedup = await Deduplicator.open(
      { articles: stores.articles, dedupTitles: stores.dedupTitles, embedder, logger: silentLogger },
      { ...OPTIONS, windowCapacity: 2 },
      "run-1",
      NOW,
    );

    const outcome = await dedup.accept(candidate("Chip shortage deepens"), NOW);

    expect(outcome).toEqual({ kind: "rejected-exact", titleNorm: "chip shortage deepens" });
    expect(embedder.calls).toHaveLength(0);
    expect(stores.articles.rows.size).toBe(0);
  });

  it("accepts a title whose window entry has aged out", async () => {
    await stores.dedupTitles.record({
      titleNorm: "chip shortage deepens",
      source: "feed",
      seenAt: new Date(NOW.getTime() - 31 * DAY_MS).toISOString(),
    });
    const dedup = await open();

    const outcome = await dedup.accept(candidate("Chip shortage deepens"), NOW);

    expect(outcome.kind).toBe("accepted");
  });

  it("treats similarity exactly at the threshold as a duplicate", async () => {
    const stored = stores.articles.seed(
      makeArticle({ id: "stored-1", embedding: BASE, scrapedAt: "2026-01-09T00:00:00.000Z" }),
    );
    const dedup = await open();

    const outcome = await dedup.accept(candidate("Chip supply squeeze worsens"), NOW);

    expect(outcome).toEqual({
      kind: "rejected-semantic",
      matchId: stored.id,
      similarity: 0.85,
    });
    expect(stores.articles.rows.size).toBe(1);
  });

  it("accepts similarity just below the threshold", async () => {
    stores.articles.seed(
      makeArticle({ id: "stored-1", embedding: BASE, scrapedAt: "2026-01-09T00:00:00.000Z" }),
    );
    const dedup = await open();

    const outcome = await dedup.accept(candidate("Chip makers expand capacity"), NOW);

    expect(outcome.kind).toBe("accepted");
  });

  it("ignores stored embeddings older than the semantic window", async () => {
    stores.articles.seed(
      makeArticle({ id: "stored-1", embedding: BASE, scrapedAt: "2025-11-01T00:00:00.000Z" }),
    );
    const dedup = await open();

    const outcome = await dedup.accept(candidate("Chip supply squeeze worsens"), NOW);

    expect(outcome.kind).toBe("accepted");
  });

  it("compares against articles accepted earlier in the same run", async () => {
    const dedup = await open();

    const first = await dedup.accept(candidate("Chip shortage deepens"), NOW);
    const second = await dedup.accept(candidate("Chip supply squeeze worsens"), NOW);

    if (first.kind !== "accepted") throw new Error("first candidate should be accepted");
    expect(second).toMatchObject({ kind: "rejected-semantic", matchId: first.article.id });
  });

  it("accepts on the exact check alone when embedding fails", async () => {
    embedder = new FakeEmbedder([], null, ["Quantum"]);
    const dedup = await open();

    const outcome = await dedup.accept(candidate("Quantum error rates fall"), NOW);

    if (outcome.kind !== "accepted") throw new Error("expected acceptance");
    expect(outcome.semanticUnverified).toBe(true);
    expect(outcome.article.semanticUnverified).toBe(true);
    expect(outcome.article.embedding).toBeUndefined();
    expect(outcome.article.status).toBe("pending");
    expect(outcome.article.scrapeRunId).toBe("run-1");
  });

  it("embeds documents with the retrieval-document task type", async () => {
    const dedup = await open();

    await dedup.accept(candidate("Robotics startup raises"), NOW);

    expect(embedder.calls).toEqual([
      { text: "Robotics startup raises", taskType: "RETRIEVAL_DOCUMENT" },
    ]);
  });
});
