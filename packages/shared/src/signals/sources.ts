import type { SourceDefinition } from "../ingest/sources.js";
import type { SourceVolume } from "../stores.js";
import type { ScrapeRun } from "../types.js";

/** Relevance from which an article counts toward signal quality */
export const HIGH_RELEVANCE = 4;

export interface SourceHealth {
  name: string;
  configured: boolean;
  articleCount: number;
  highRelevanceCount: number;
  /** Share of articles scored 4 or 5, one decimal */
  signalQualityPct: number;
  lastSuccessAt: string | null;
  lastFailureAt: string | null;
}

/**
 * Per-source volume and quality from `volumes`, with the last scrape run
 * in which each source succeeded or failed. `runs` are newest first.
 */
export function summarizeSources(
  configured: SourceDefinition[],
  volumes: SourceVolume[],
  runs: ScrapeRun[],
): SourceHealth[] {
  const health = new Map<string, SourceHealth>();
  const entry = (name: string, isConfigured: boolean): SourceHealth => {
    let h = health.get(name);
    if (!h) {
      h = {
        name,
        configured: isConfigured,
        articleCount: 0,
        highRelevanceCount: 0,
        signalQualityPct: 0,
        lastSuccessAt: null,
        lastFailureAt: null,
      };
      health.set(name, h);
    }
    return h;
  };

  for (const s of configured) entry(s.name, true);

  for (const v of volumes) {
    const h = entry(v.source, false);
    h.articleCount += v.articleCount;
    h.highRelevanceCount += v.highRelevanceCount;
  }

  for (const run of runs) {
    if (run.mode !== "scrape") continue;
    const at = run.finishedAt ?? run.startedAt;
    for (const name of run.sourcesOk) {
      const h = health.get(name);
      if (h && h.lastSuccessAt === null) h.lastSuccessAt = at;
    }
    for (const name of run.sourcesFailed) {
      const h = health.get(name);
      if (h && h.lastFailureAt === null) h.lastFailureAt = at;
    }
  }

  for (const h of health.values()) {
    h.signalQualityPct =
      h.articleCount > 0
        ? Math.round((1000 * h.highRelevanceCount) / h.articleCount) / 10
        : 0;
  }

  return [...health.values()].sort(
    (a, b) => b.articleCount - a.articleCount || a.name.localeCompare(b.name),
  );
}
