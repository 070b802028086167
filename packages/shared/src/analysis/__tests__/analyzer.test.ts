import { describe, it, expect, beforeEach, vi } from "vitest";
import {
  FakeEmbedder,
  FakeLlm,
  createMemoryStores,
  makeArticle,
  type MemoryStores,
} from "../../testing/index.js";
import { StorageError } from "../../errors.js";
import { silentLogger } from "../../logger.js";
import { draftQueueItems, runAnalysis, type AnalyzeOptions } from "../analyzer.js";

const NOW = new Date("2026-01-10T07:00:00.000Z");

const OPTIONS: AnalyzeOptions = {
  minRelevance: 3,
  platforms: ["devto", "linkedin"],
  maxRetries: 3,
  llmTimeoutMs: 1000,
  embedTimeoutMs: 1000,
  now: () => NOW,
};

const SECTIONS = {
  lead: "Chipmakers race to add capacity.",
  patterns: "Supply deals everywhere.",
  signals: "Edge inference is picking up.",
  watchlist: [],
  data: ["$4B raised"],
};

function stage1Reply() {
  // p1..p4 in listPending order
  return {
    results: [
      { index: 0, english_title: "Chip fab expands", category: "investment", relevance: 5 },
      { index: 1, english_title: "Minor update", category: "product", relevance: 3 },
      { index: 2, english_title: "Seed round closes", category: "funding", relevance: 4 },
      { index: 3, english_title: "Celebrity gadget", category: "other", relevance: 1 },
    ],
  };
}

function stage2Reply() {
  return {
    briefing: SECTIONS,
    drafts: [
      { article_id: "p1", urgency: "high", title: "Fab", long_form: "Long p1", short_form: "Short p1" },
      { article_id: "p3", urgency: "medium", title: "Seed", long_form: "Long p3", short_form: "Short p3" },
      { article_id: "p2", urgency: "low", title: "Update", long_form: "Long p2", short_form: "Short p2" },
    ],
  };
}

describe("draftQueueItems", () => {
  const draft = {
    articleId: "p1",
    urgency: "high" as const,
    title: "Fab",
    longForm: "Long p1",
    shortForm: "Short p1",
  };

  it("sends long form to article platforms and the short post to social ones", () => {
    expect(draftQueueItems(draft, ["devto", "linkedin"], "Lead text", 3, "b-1")).toEqual([
      {
        platform: "devto",
        title: "Fab",
        body: "Long p1",
        fallbackBody: "Short p1",
        urgency: "high",
        language: "en",
        maxRetries: 3,
        briefingId: "b-1",
        articleId: "p1",
      },
      {
        platform: "linkedin",
        title: undefined,
        body: "Short p1",
        fallbackBody: "Lead text",
        urgency: "high",
        language: "en",
        maxRetries: 3,
        briefingId: "b-1",
        articleId: "p1",
      },
    ]);
  });

  it("truncates the lead fallback to 500 characters", () => {
    const [item] = draftQueueItems(draft, ["linkedin"], "x".repeat(600), 3, "b-1");
    expect(item?.fallbackBody).toHaveLength(500);
  });
});

describe("runAnalysis", () => {
  let stores: MemoryStores;
  let embedder: FakeEmbedder;

  beforeEach(() => {
    stores = createMemoryStores();
    embedder = new FakeEmbedder([], [1, 0]);
    for (const id of ["p1", "p2", "p3", "p4"]) {
      stores.articles.seed(makeArticle({ id, status: "pending", scrapedAt: "2026-01-10T05:00:00.000Z" }));
    }
    stores.articles.seed(
      makeArticle({
        id: "history-1",
        englishTitle: "Earlier fab news",
        category: "investment",
        relevance: 4,
        embedding: [1, 0],
        scrapedAt: "2026-01-03T05:00:00.000Z",
      }),
    );
  });

  function deps(llm: FakeLlm) {
    return { stores, embedder, llm, logger: silentLogger };
  }

  it("classifies, synthesizes, stores the briefing and queues one item per platform per draft", async () => {
    const llm = new FakeLlm([stage1Reply(), stage2Reply()]);

    const report = await runAnalysis(deps(llm), OPTIONS);

    expect(report).toMatchObject({
      status: "completed",
      pending: 4,
      classified: 4,
      leftPending: 0,
      relevant: 3,
      contextArticles: 1,
      drafts: 3,
      postsQueued: 6,
      errors: [],
    });

    const briefing = await stores.briefings.latest();
    expect(briefing).toMatchObject({
      id: report.briefingId,
      sections: SECTIONS,
      articleCount: 3,
      modelUsed: "fake-model",
      analysisRunId: report.analysisRunId,
      createdAt: NOW.toISOString(),
    });

    expect(stores.analysisRuns.rows).toHaveLength(1);
    expect(stores.analysisRuns.rows[0]).toMatchObject({
      id: report.analysisRunId,
      status: "completed",
      inputArticleIds: ["p1", "p3", "p2"],
      articlesConsumed: 4,
      briefingId: report.briefingId,
      briefingText: briefing?.text,
    });

    const queued = await stores.publishQueue.listEligible(NOW.toISOString(), { limit: 10 });
    expect(queued.map((q) => [q.articleId, q.platform, q.priority])).toEqual([
      ["p1", "devto", 1],
      ["p1", "linkedin", 1],
      ["p3", "devto", 2],
      ["p3", "linkedin", 2],
      ["p2", "devto", 3],
      ["p2", "linkedin", 3],
    ]);

    const run = stores.scrapeRuns.rows.get(report.scrapeRunId);
    expect(run).toMatchObject({
      mode: "analyze",
      articlesFound: 4,
      articlesNew: 3,
      sourcesOk: ["analyze_pipeline"],
      sourcesFailed: [],
    });
  });

  it("passes earlier coverage to stage 2 and never the run's own articles", async () => {
    const llm = new FakeLlm([stage1Reply(), stage2Reply()]);

    await runAnalysis(deps(llm), OPTIONS);

    const prompt = llm.requests[1]?.prompt ?? "";
    expect(prompt).toContain("- [test-source] Earlier fab news (2026-01-03)");
    expect(embedder.calls).toEqual([
      { text: "Chip fab expands\nSeed round closes\nMinor update", taskType: "RETRIEVAL_QUERY" },
    ]);
  });

  it("records a failed run without a briefing when stage 2 never validates", async () => {
    const llm = new FakeLlm([stage1Reply(), { drafts: [] }, { drafts: [] }]);

    const report = await runAnalysis(deps(llm), OPTIONS);

    expect(report.status).toBe("failed");
    expect(report.briefingId).toBeUndefined();
    expect(stores.briefings.rows).toHaveLength(0);
    expect(stores.publishQueue.rows.size).toBe(0);
    expect(stores.analysisRuns.rows[0]?.status).toBe("failed");
    expect(stores.articles.rows.get("p1")?.status).toBe("analyzed");
    expect(stores.scrapeRuns.rows.get(report.scrapeRunId)?.sourcesFailed).toEqual([
      "analyze_pipeline",
    ]);
  });

  it("skips stage 2 when nothing is pending", async () => {
    const empty = createMemoryStores();
    const llm = new FakeLlm();

    const report = await runAnalysis({ ...deps(llm), stores: empty }, OPTIONS);

    expect(report.status).toBe("skipped");
    expect(llm.requests).toHaveLength(0);
    expect(empty.analysisRuns.rows[0]).toMatchObject({ status: "skipped", inputArticleIds: [] });
  });

  it("skips stage 2 when nothing clears the relevance floor", async () => {
    const llm = new FakeLlm([stage1Reply()]);

    const report = await runAnalysis(deps(llm), { ...OPTIONS, minRelevance: 6 });

    expect(report.status).toBe("skipped");
    expect(report.classified).toBe(4);
    expect(llm.requests).toHaveLength(1);
  });

  it("records the error on the run and rethrows when storage fails", async () => {
    vi.spyOn(stores.briefings, "insert").mockRejectedValue(new StorageError("insert briefing: down"));
    const llm = new FakeLlm([stage1Reply(), stage2Reply()]);

    await expect(runAnalysis(deps(llm), OPTIONS)).rejects.toThrow("insert briefing: down");

    const [run] = await stores.scrapeRuns.listRecent(1, "analyze");
    expect(run?.error).toBe("insert briefing: down");
    expect(stores.analysisRuns.rows).toHaveLength(0);
  });

  it("keeps neither briefing nor queue items when an enqueue fails partway", async () => {
    const enqueue = stores.publishQueue.enqueue.bind(stores.publishQueue);
    vi.spyOn(stores.publishQueue, "enqueue")
      .mockImplementationOnce(enqueue)
      .mockRejectedValueOnce(new StorageError("enqueue: down"));
    const llm = new FakeLlm([stage1Reply(), stage2Reply()]);

    await expect(runAnalysis(deps(llm), OPTIONS)).rejects.toThrow("enqueue: down");

    expect(stores.briefings.rows).toHaveLength(0);
    expect(stores.publishQueue.rows.size).toBe(0);
    const [run] = await stores.scrapeRuns.listRecent(1, "analyze");
    expect(run?.error).toBe("enqueue: down");
  });
});
