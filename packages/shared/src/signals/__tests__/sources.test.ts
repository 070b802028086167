import { describe, it, expect } from "vitest";
import type { ScrapeRun } from "../../types.js";
import { summarizeSources } from "../sources.js";

function run(overrides: Partial<ScrapeRun> & { id: string }): ScrapeRun {
  return {
    mode: "scrape",
    startedAt: "2026-01-09T00:00:00.000Z",
    articlesFound: 0,
    articlesNew: 0,
    sourcesOk: [],
    sourcesFailed: [],
    ...overrides,
  };
}

describe("summarizeSources", () => {
  const configured = [
    { name: "alpha", url: "https://alpha.example/feed", enabled: true },
    { name: "beta", url: "https://beta.example/feed", enabled: true },
  ];
  const volumes = [
    { source: "alpha", articleCount: 2, highRelevanceCount: 1 },
    { source: "gamma", articleCount: 1, highRelevanceCount: 1 },
  ];
  // newest first
  const runs = [
    run({ id: "r3", mode: "analyze", finishedAt: "2026-01-10T09:00:00.000Z", sourcesOk: ["analyze_pipeline"] }),
    run({ id: "r2", finishedAt: "2026-01-10T06:00:00.000Z", sourcesOk: ["alpha"], sourcesFailed: ["beta"] }),
    run({ id: "r1", finishedAt: "2026-01-09T06:00:00.000Z", sourcesOk: ["alpha", "beta"] }),
  ];

  it("reports volume, quality and last outcomes per source", () => {
    expect(summarizeSources(configured, volumes, runs)).toEqual([
      {
        name: "alpha",
        configured: true,
        articleCount: 2,
        highRelevanceCount: 1,
        signalQualityPct: 50,
        lastSuccessAt: "2026-01-10T06:00:00.000Z",
        lastFailureAt: null,
      },
      {
        name: "gamma",
        configured: false,
        articleCount: 1,
        highRelevanceCount: 1,
        signalQualityPct: 100,
        lastSuccessAt: null,
        lastFailureAt: null,
      },
      {
        name: "beta",
        configured: true,
        articleCount: 0,
        highRelevanceCount: 0,
        signalQualityPct: 0,
        lastSuccessAt: "2026-01-09T06:00:00.000Z",
        lastFailureAt: "2026-01-10T06:00:00.000Z",
      },
    ]);
  });
});
