// =============================================================================
// Unit tests for Article Neo4j operations
// =============================================================================

import { describe, it, expect, beforeEach } from "vitest";
import neo4j from "neo4j-driver";
import { Neo4jArticleStore, statusesBefore, toArticle } from "../articles.js";
import { createMockDriver, mockNode, mockRecord, runCall, type MockTx } from "./mock-driver.js";

describe("Neo4jArticleStore", () => {
  let store: Neo4jArticleStore;
  let mockTx: MockTx;
  let driver: ReturnType<typeof createMockDriver>["driver"];

  beforeEach(() => {
    const mock = createMockDriver();
    driver = mock.driver;
    store = new Neo4jArticleStore(driver);
    mockTx = mock.mockTx;
  });

  describe("search", () => {
    it("oversamples the index and converts its score back to cosine", async () => {
      mockTx.run.mockResolvedValue({
        records: [
          mockRecord({
            node: mockNode({ id: "a1", title: "Fab", status: "analyzed", scraped_at: "2026-01-10T00:00:00.000Z" }),
            score: 0.9,
          }),
        ],
      });

      const results = await store.search([0.1, 0.2], {
        limit: 10,
        excludeIds: ["x1", "x2"],
        minRelevance: 4,
      });

      expect(results).toHaveLength(1);
      expect(results[0]?.article.id).toBe("a1");
      expect(results[0]?.score).toBeCloseTo(0.8, 10);
      expect(runCall(mockTx).params).toEqual({
        index: "article_embedding",
        k: neo4j.int(42),
        vector: [0.1, 0.2],
        excludeIds: ["x1", "x2"],
        category: null,
        minRelevance: neo4j.int(4),
        limit: neo4j.int(10),
      });
    });
  });

  describe("countByCategory", () => {
    it("aggregates in the database and drops unknown categories", async () => {
      mockTx.run.mockResolvedValue({
        records: [
          mockRecord({ category: "product", n: neo4j.int(2400) }),
          mockRecord({ category: "gossip", n: neo4j.int(3) }),
        ],
      });

      const counts = await store.countByCategory({
        since: "2026-01-03T08:00:00.000Z",
        until: "2026-01-10T08:00:00.000Z",
      });

      expect(counts).toEqual({ product: 2400 });
      const { cypher, params } = runCall(mockTx);
      expect(cypher).toContain("RETURN a.category AS category, count(*) AS n");
      expect(cypher).not.toContain("LIMIT");
      expect(params).toEqual({
        since: "2026-01-03T08:00:00.000Z",
        until: "2026-01-10T08:00:00.000Z",
      });
    });
  });

  describe("volumeBySource", () => {
    it("counts totals and high-relevance articles per source", async () => {
      mockTx.run.mockResolvedValue({
        records: [mockRecord({ source: "wire", n: neo4j.int(12), high: neo4j.int(5) })],
      });

      const volumes = await store.volumeBySource({ since: "2025-12-11T08:00:00.000Z" }, 4);

      expect(volumes).toEqual([{ source: "wire", articleCount: 12, highRelevanceCount: 5 }]);
      expect(runCall(mockTx).params).toEqual({
        since: "2025-12-11T08:00:00.000Z",
        until: null,
        high: neo4j.int(4),
      });
    });
  });

  describe("applyEnrichment", () => {
    it("only enriches articles that are still pending", async () => {
      mockTx.run.mockResolvedValue({ records: [mockRecord({ n: neo4j.int(0) })] });

      const applied = await store.applyEnrichment("a1", {
        englishTitle: "Fab",
        category: "investment",
        relevance: 4,
      });

      expect(applied).toBe(false);
      const { cypher, params } = runCall(mockTx);
      expect(cypher).toContain("WHERE a.status = 'pending'");
      expect(params).toEqual({
        id: "a1",
        englishTitle: "Fab",
        category: "investment",
        relevance: neo4j.int(4),
      });
    });
  });

  describe("advanceStatus", () => {
    it("moves articles forward only", async () => {
      mockTx.run.mockResolvedValue({ records: [mockRecord({ n: neo4j.int(1) })] });

      expect(await store.advanceStatus(["a1", "a2"], "published")).toBe(1);
      expect(runCall(mockTx).params).toEqual({
        ids: ["a1", "a2"],
        from: ["pending", "analyzed"],
        status: "published",
      });
    });

    it("skips the round trip when there is nothing to do", async () => {
      expect(await store.advanceStatus([], "published")).toBe(0);
      expect(await store.advanceStatus(["a1"], "pending")).toBe(0);
      expect(driver.session).not.toHaveBeenCalled();
    });
  });

  describe("getByAnyId", () => {
    it("matches on either id and prefers the internal one", async () => {
      mockTx.run.mockResolvedValue({ records: [] });

      expect(await store.getByAnyId("guid-77")).toBeNull();
      const { cypher } = runCall(mockTx);
      expect(cypher).toContain("WHERE a.id = $id OR a.source_id = $id");
      expect(cypher).toContain("ORDER BY CASE WHEN a.id = $id THEN 0 ELSE 1 END");
    });
  });
});

describe("statusesBefore", () => {
  it("lists the earlier lifecycle states", () => {
    expect(statusesBefore("archived")).toEqual(["pending", "analyzed", "published"]);
    expect(statusesBefore("pending")).toEqual([]);
  });
});

describe("toArticle", () => {
  it("converts driver values and drops unknown enum values", () => {
    const article = toArticle({
      id: "a1",
      source: "wire",
      source_id: "guid-1",
      title: "Fab",
      title_norm: "fab",
      body: "",
      scraped_at: "2026-01-10T00:00:00.000Z",
      status: "analyzed",
      category: "gossip",
      relevance: neo4j.int(4),
      embedding: [0.5, neo4j.int(1)],
      semantic_unverified: true,
    });

    expect(article).toMatchObject({
      id: "a1",
      sourceId: "guid-1",
      category: undefined,
      relevance: 4,
      embedding: [0.5, 1],
      semanticUnverified: true,
      url: undefined,
    });
  });
});
