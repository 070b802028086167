// =============================================================================
// @tidewire/shared: Scrape runner
// =============================================================================
// fetch (all sources, concurrently, each under its own timeout)
//   -> normalize -> dedup (sequential, in source order) -> persist
//
// One failing source never affects the others: each fetch settles into a
// Result and failures are listed in the run record. Storage failures abort
// the run after the error is written to the run record.
// =============================================================================

import type { Embedder } from "../embeddings/index.js";
import { errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import type { ArticleStore, DedupTitleStore, ScrapeRunStore } from "../stores.js";
import { withTimeout } from "../timeout.js";
import { err, ok, type RawRecord, type Result } from "../types.js";
import { Deduplicator, type DeduplicatorOptions } from "./deduplicator.js";
import { normalizeRecord } from "./normalize.js";
import type { SourceDefinition, SourceFetcher } from "./sources.js";

export interface ScrapeDeps {
  articles: ArticleStore;
  dedupTitles: DedupTitleStore;
  scrapeRuns: ScrapeRunStore;
  fetcher: SourceFetcher;
  embedder: Embedder;
  logger: Logger;
}

export interface ScrapeOptions {
  sources: SourceDefinition[];
  fetchTimeoutMs: number;
  bodyMaxChars: number;
  dedup: DeduplicatorOptions;
  /** Recorded on the run */
  triggeredBy?: string;
  now?: () => Date;
}

export interface SourceFailure {
  source: string;
  error: string;
}

export interface ScrapeReport {
  runId: string;
  articlesFound: number;
  articlesNew: number;
  rejectedExact: number;
  rejectedSemantic: number;
  /** Records whose title normalized to nothing */
  invalid: number;
  semanticUnverified: number;
  sourcesOk: string[];
  sourcesFailed: SourceFailure[];
  newArticleIds: string[];
  durationS: number;
}

type FetchOutcome = {
  source: SourceDefinition;
  result: Result<RawRecord[], string>;
};

export async function runScrape(
  deps: ScrapeDeps,
  options: ScrapeOptions,
): Promise<ScrapeReport> {
  const now = options.now ?? (() => new Date());
  const startedAt = now();
  const log = deps.logger.child({ component: "scrape" });

  const runId = await deps.scrapeRuns.start(
    "scrape",
    startedAt.toISOString(),
    options.triggeredBy,
  );

  const report: ScrapeReport = {
    runId,
    articlesFound: 0,
    articlesNew: 0,
    rejectedExact: 0,
    rejectedSemantic: 0,
    invalid: 0,
    semanticUnverified: 0,
    sourcesOk: [],
    sourcesFailed: [],
    newArticleIds: [],
    durationS: 0,
  };

  try {
    const fetched = await Promise.all(
      options.sources.map((source) => fetchSource(deps, source, options)),
    );

    const dedup = await Deduplicator.open(
      deps,
      options.dedup,
      runId,
      startedAt,
    );

    for (const { source, result } of fetched) {
      if (!result.ok) {
        report.sourcesFailed.push({ source: source.name, error: result.error });
        log.warn("Source failed", { source: source.name, error: result.error });
        continue;
      }

      report.sourcesOk.push(source.name);
      report.articlesFound += result.value.length;

      for (const record of result.value) {
        const candidate = normalizeRecord(record, options.bodyMaxChars);
        if (!candidate) {
          report.invalid++;
          continue;
        }

        const outcome = await dedup.accept(candidate, now());
        switch (outcome.kind) {
          case "accepted":
            report.articlesNew++;
            report.newArticleIds.push(outcome.article.id);
            if (outcome.semanticUnverified) report.semanticUnverified++;
            break;
          case "rejected-exact":
            report.rejectedExact++;
            break;
          case "rejected-semantic":
            report.rejectedSemantic++;
            break;
        }
      }
    }
  } catch (error) {
    await finishRun(deps, report, startedAt, now(), errorMessage(error));
    throw error;
  }

  await finishRun(deps, report, startedAt, now());

  log.info("Scrape complete", {
    runId,
    found: report.articlesFound,
    new: report.articlesNew,
    rejectedExact: report.rejectedExact,
    rejectedSemantic: report.rejectedSemantic,
    invalid: report.invalid,
    sourcesFailed: report.sourcesFailed.length,
  });

  return report;
}

async function fetchSource(
  deps: ScrapeDeps,
  source: SourceDefinition,
  options: ScrapeOptions,
): Promise<FetchOutcome> {
  try {
    const records = await withTimeout(
      deps.fetcher.fetch(source),
      options.fetchTimeoutMs,
      `fetch ${source.name}`,
    );
    return { source, result: ok(records) };
  } catch (error) {
    return { source, result: err(errorMessage(error)) };
  }
}

async function finishRun(
  deps: ScrapeDeps,
  report: ScrapeReport,
  startedAt: Date,
  finishedAt: Date,
  error?: string,
): Promise<void> {
  report.durationS =
    Math.round((finishedAt.getTime() - startedAt.getTime()) / 100) / 10;

  const write = deps.scrapeRuns.finish(
    report.runId,
    {
      articlesFound: report.articlesFound,
      articlesNew: report.articlesNew,
      sourcesOk: report.sourcesOk,
      sourcesFailed: report.sourcesFailed.map((f) => f.source),
      error,
    },
    finishedAt.toISOString(),
  );

  if (error === undefined) {
    await write;
    return;
  }

  // The original failure is what the caller sees; a second failure writing
  // the run record is logged alongside it.
  try {
    await write;
  } catch (finishError) {
    deps.logger.error("Failed to record scrape run failure", {
      runId: report.runId,
      error: errorMessage(finishError),
      originalError: error,
    });
  }
}
