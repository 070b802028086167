// =============================================================================
// Unit tests for DedupTitle and Briefing Neo4j operations
// =============================================================================

import { describe, it, expect } from "vitest";
import neo4j from "neo4j-driver";
import { Neo4jBriefingStore, Neo4jDedupTitleStore, Neo4jScrapeRunStore } from "../runs.js";
import { createMockDriver, mockNode, mockRecord, runCall } from "./mock-driver.js";

describe("Neo4jDedupTitleStore.has", () => {
  it("looks the title up from the window start", async () => {
    const { driver, mockTx } = createMockDriver();
    mockTx.run.mockResolvedValue({ records: [mockRecord({ n: neo4j.int(1) })] });
    const store = new Neo4jDedupTitleStore(driver);

    const seen = await store.has("chip shortage deepens", "2025-12-11T06:00:00.000Z");

    expect(seen).toBe(true);
    const { cypher, params } = runCall(mockTx);
    expect(cypher).toContain("MATCH (d:DedupTitle {title_norm: $titleNorm})");
    expect(params).toEqual({ titleNorm: "chip shortage deepens", since: "2025-12-11T06:00:00.000Z" });
  });

  it("is false when no row matches", async () => {
    const { driver, mockTx } = createMockDriver();
    mockTx.run.mockResolvedValue({ records: [mockRecord({ n: neo4j.int(0) })] });

    expect(await new Neo4jDedupTitleStore(driver).has("fab opens", "2025-12-11T06:00:00.000Z")).toBe(false);
  });
});

describe("Neo4jScrapeRunStore", () => {
  it("stores who started the run", async () => {
    const { driver, mockTx } = createMockDriver();
    mockTx.run.mockResolvedValue({ records: [mockRecord({ id: "run-1" })] });

    const id = await new Neo4jScrapeRunStore(driver).start("publish", "2026-01-10T08:00:00.000Z", "tester");

    expect(id).toBe("run-1");
    expect(runCall(mockTx).params).toEqual({
      mode: "publish",
      triggeredBy: "tester",
      startedAt: "2026-01-10T08:00:00.000Z",
    });
  });

  it("reads the starter back from the node", async () => {
    const { driver, mockTx } = createMockDriver();
    mockTx.run.mockResolvedValue({
      records: [
        mockRecord({
          r: mockNode({
            id: "run-1",
            mode: "cycle",
            triggered_by: "scheduler",
            started_at: "2026-01-10T08:00:00.000Z",
            articles_found: neo4j.int(3),
            articles_new: neo4j.int(1),
            sources_ok: ["scrape"],
            sources_failed: [],
          }),
        }),
      ],
    });

    expect(await new Neo4jScrapeRunStore(driver).latest()).toMatchObject({
      id: "run-1",
      mode: "cycle",
      triggeredBy: "scheduler",
      articlesFound: 3,
    });
  });
});

describe("Neo4jBriefingStore.insert", () => {
  const briefing = {
    id: "b-1",
    sections: { lead: "Lead", patterns: "", signals: "", watchlist: [], data: [] },
    text: "# Briefing",
    articleCount: 2,
    modelUsed: "fake-model",
    analysisRunId: "run-1",
    createdAt: "2026-01-10T07:00:00.000Z",
  };

  it("writes the briefing and its queue items in one transaction", async () => {
    const { driver, mockTx, session } = createMockDriver();
    mockTx.run.mockResolvedValue({ records: [] });
    const store = new Neo4jBriefingStore(driver);

    await store.insert(briefing, [
      { platform: "devto", title: "Fab", body: "Long", urgency: "high", maxRetries: 3, briefingId: "b-1" },
      { platform: "linkedin", body: "Short", urgency: "high", maxRetries: 3, briefingId: "b-1" },
    ]);

    expect(session.executeWrite).toHaveBeenCalledTimes(1);
    expect(mockTx.run).toHaveBeenCalledTimes(3);
    expect(runCall(mockTx, 0).cypher).toContain("CREATE (:Briefing");
    const second = runCall(mockTx, 2);
    expect(second.cypher).toContain("CREATE (q:PublishQueueItem");
    expect(second.params).toMatchObject({
      platform: "linkedin",
      title: null,
      priority: neo4j.int(1),
      briefingId: "b-1",
      createdAt: "2026-01-10T07:00:00.000Z",
    });
  });

  it("surfaces a failed item write as a storage error", async () => {
    const { driver, mockTx, session } = createMockDriver();
    mockTx.run
      .mockResolvedValueOnce({ records: [] })
      .mockRejectedValueOnce(new Error("ServiceUnavailable"));

    await expect(
      new Neo4jBriefingStore(driver).insert(briefing, [
        { platform: "devto", body: "Long", urgency: "low", maxRetries: 3 },
      ]),
    ).rejects.toThrow("insert briefing: ServiceUnavailable");
    expect(session.close).toHaveBeenCalledTimes(1);
  });
});
