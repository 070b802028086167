// =============================================================================
// Unit tests for PublishQueueItem Neo4j operations
// =============================================================================

import { describe, it, expect, beforeEach } from "vitest";
import neo4j from "neo4j-driver";
import { StorageError } from "../../errors.js";
import { Neo4jPublishQueueStore, parsePublishLog, toQueueItem } from "../publish-queue.js";
import { createMockDriver, mockNode, mockRecord, runCall, type MockTx } from "./mock-driver.js";

describe("Neo4jPublishQueueStore", () => {
  let store: Neo4jPublishQueueStore;
  let mockTx: MockTx;
  let session: ReturnType<typeof createMockDriver>["session"];

  beforeEach(() => {
    const mock = createMockDriver();
    store = new Neo4jPublishQueueStore(mock.driver);
    mockTx = mock.mockTx;
    session = mock.session;
  });

  describe("enqueue", () => {
    it("creates a queued item with integer priority and retry limit", async () => {
      mockTx.run.mockResolvedValue({
        records: [
          mockRecord({
            q: mockNode({
              id: "q-1",
              platform: "devto",
              body: "Long body",
              urgency: "high",
              priority: neo4j.int(1),
              language: "en",
              status: "queued",
              retry_count: neo4j.int(0),
              max_retries: neo4j.int(3),
              next_retry_at: null,
              publish_log: [],
              created_at: "2026-01-10T08:00:00.000Z",
            }),
          }),
        ],
      });

      const item = await store.enqueue(
        { platform: "devto", body: "Long body", urgency: "high", maxRetries: 3 },
        "2026-01-10T08:00:00.000Z",
      );

      const { cypher, params } = runCall(mockTx);
      expect(cypher).toContain("CREATE (q:PublishQueueItem");
      expect(params).toMatchObject({
        platform: "devto",
        title: null,
        fallbackBody: null,
        priority: neo4j.int(1),
        maxRetries: neo4j.int(3),
        language: "en",
      });
      expect(item).toMatchObject({
        id: "q-1",
        status: "queued",
        priority: 1,
        retryCount: 0,
        maxRetries: 3,
        nextRetryAt: null,
        publishLog: [],
      });
      expect(session.executeWrite).toHaveBeenCalledTimes(1);
    });
  });

  describe("claim", () => {
    it("locks the item and re-checks eligibility before taking it", async () => {
      mockTx.run.mockResolvedValue({ records: [] });

      const claimed = await store.claim("q-1", "2026-01-10T08:00:00.000Z");

      expect(claimed).toBeNull();
      const { cypher, params } = runCall(mockTx);
      expect(cypher).toContain("SET q._lock = true");
      expect(cypher).toContain("q.status = 'retry_queued'");
      expect(cypher).toContain("SET q.status = 'publishing', q.claimed_at = $now");
      expect(params).toEqual({ id: "q-1", now: "2026-01-10T08:00:00.000Z" });
    });
  });

  describe("settle", () => {
    const settlement = {
      status: "retry_queued" as const,
      retryCount: 1,
      nextRetryAt: "2026-01-10T08:05:00.000Z",
      logEntry: { at: "2026-01-10T08:00:00.000Z", outcome: "failed" as const, error: "boom", retryable: true },
      error: "boom",
    };

    it("appends the log entry as JSON and reports success", async () => {
      mockTx.run.mockResolvedValue({ records: [mockRecord({ n: neo4j.int(1) })] });

      expect(await store.settle("q-1", settlement)).toBe(true);

      const { cypher, params } = runCall(mockTx);
      expect(cypher).toContain("WHERE q.status = 'publishing'");
      expect(params).toMatchObject({
        id: "q-1",
        status: "retry_queued",
        retryCount: neo4j.int(1),
        nextRetryAt: "2026-01-10T08:05:00.000Z",
        entry: '{"at":"2026-01-10T08:00:00.000Z","outcome":"failed","error":"boom","retryable":true}',
        platformId: null,
        publishedAt: null,
      });
    });

    it("reports a lost claim", async () => {
      mockTx.run.mockResolvedValue({ records: [mockRecord({ n: neo4j.int(0) })] });
      expect(await store.settle("q-1", settlement)).toBe(false);
    });
  });

  describe("reclaimStale", () => {
    it("logs why the claim was taken back", async () => {
      mockTx.run.mockResolvedValue({ records: [mockRecord({ n: neo4j.int(2) })] });

      const count = await store.reclaimStale("2026-01-10T07:45:00.000Z", "2026-01-10T08:00:00.000Z");

      expect(count).toBe(2);
      expect(runCall(mockTx).params).toEqual({
        claimedBefore: "2026-01-10T07:45:00.000Z",
        entry: '{"at":"2026-01-10T08:00:00.000Z","outcome":"reclaimed","error":"claim taken before 2026-01-10T07:45:00.000Z expired"}',
      });
    });
  });

  describe("skip", () => {
    it("appends the skip with its operator to the log", async () => {
      mockTx.run.mockResolvedValue({ records: [mockRecord({ n: neo4j.int(1) })] });

      expect(await store.skip("q-1", "duplicate", "2026-01-10T08:00:00.000Z", "editor")).toBe(true);
      expect(runCall(mockTx).params).toEqual({
        id: "q-1",
        entry: '{"at":"2026-01-10T08:00:00.000Z","outcome":"skipped","error":"duplicate","operator":"editor"}',
      });
    });
  });

  describe("errors", () => {
    it("wraps driver failures in StorageError and closes the session", async () => {
      mockTx.run.mockRejectedValue(new Error("ServiceUnavailable"));

      const failure = store.skip("q-1", "duplicate", "2026-01-10T08:00:00.000Z");

      await expect(failure).rejects.toBeInstanceOf(StorageError);
      await expect(failure).rejects.toThrow("skip: ServiceUnavailable");
      expect(session.close).toHaveBeenCalledTimes(1);
    });
  });
});

describe("parsePublishLog", () => {
  it("keeps only well-formed entries", () => {
    expect(
      parsePublishLog([
        '{"at":"2026-01-10T08:00:00.000Z","outcome":"published","platformId":"p-1"}',
        "not json",
        '{"at":"2026-01-10T08:00:00.000Z","outcome":"exploded"}',
        7,
      ]),
    ).toEqual([{ at: "2026-01-10T08:00:00.000Z", outcome: "published", platformId: "p-1" }]);
  });

  it("treats a missing property as an empty log", () => {
    expect(parsePublishLog(null)).toEqual([]);
  });
});

describe("toQueueItem", () => {
  it("derives priority from urgency when the property is missing", () => {
    const item = toQueueItem({ id: "q-9", urgency: "low", status: "queued", created_at: "2026-01-10T08:00:00.000Z" });
    expect(item).toMatchObject({ priority: 3, language: "en", platform: "devto", nextRetryAt: null });
  });
});
