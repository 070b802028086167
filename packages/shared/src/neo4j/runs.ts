// =============================================================================
// @tidewire/shared: DedupTitle, ScrapeRun, Briefing and AnalysisRun nodes
// =============================================================================

import { z } from "zod";
import type {
  AnalysisRunStore,
  BriefingStore,
  DedupTitleStore,
  ScrapeRunStore,
} from "../stores.js";
import type {
  AnalysisRun,
  Briefing,
  BriefingSections,
  DedupTitle,
  EnqueueInput,
  RunMode,
  ScrapeRun,
  ScrapeRunStats,
} from "../types.js";
import {
  asEnum,
  asOptionalString,
  asString,
  asStringArray,
  int,
  nodeProperties,
  parseJsonProperty,
  toNumber,
  withSession,
  type Driver,
} from "./driver.js";
import { CREATE_QUEUE_ITEM, queueItemParams } from "./publish-queue.js";

const RUN_MODES: readonly RunMode[] = ["scrape", "analyze", "publish", "cycle"];

// ---------------------------------------------------------------------------
// DedupTitle
// ---------------------------------------------------------------------------

export class Neo4jDedupTitleStore implements DedupTitleStore {
  constructor(private readonly driver: Driver) {}

  async loadRecent(options: { limit: number; since: string }): Promise<DedupTitle[]> {
    return withSession(this.driver, "load dedup titles", async (session) => {
      const result = await session.executeRead((tx) =>
        tx.run(
          `MATCH (d:DedupTitle)
           WHERE d.seen_at >= $since
           RETURN d.title_norm AS titleNorm, d.source AS source, d.seen_at AS seenAt
           ORDER BY d.seen_at DESC
           LIMIT $limit`,
          { since: options.since, limit: int(options.limit) },
        ),
      );
      return result.records.map((r) => ({
        titleNorm: asString(r.get("titleNorm")),
        source: asString(r.get("source")),
        seenAt: asString(r.get("seenAt")),
      }));
    });
  }

  async has(titleNorm: string, since: string): Promise<boolean> {
    return withSession(this.driver, "find dedup title", async (session) => {
      const result = await session.executeRead((tx) =>
        tx.run(
          `MATCH (d:DedupTitle {title_norm: $titleNorm})
           WHERE d.seen_at >= $since
           RETURN count(d) AS n`,
          { titleNorm, since },
        ),
      );
      return toNumber(result.records[0]?.get("n")) > 0;
    });
  }

  async record(entry: DedupTitle): Promise<void> {
    await withSession(this.driver, "record dedup title", async (session) => {
      await session.executeWrite((tx) =>
        tx.run(
          `CREATE (:DedupTitle {title_norm: $titleNorm, source: $source, seen_at: $seenAt})`,
          { ...entry },
        ),
      );
    });
  }

  async deleteBefore(cutoff: string): Promise<number> {
    return withSession(this.driver, "clean dedup titles", async (session) => {
      const result = await session.executeWrite((tx) =>
        tx.run(
          `MATCH (d:DedupTitle)
           WHERE d.seen_at < $cutoff
           DETACH DELETE d
           RETURN count(*) AS n`,
          { cutoff },
        ),
      );
      return toNumber(result.records[0]?.get("n"));
    });
  }
}

// ---------------------------------------------------------------------------
// ScrapeRun
// ---------------------------------------------------------------------------

function toScrapeRun(props: Record<string, unknown>): ScrapeRun {
  const duration = props.duration_s;
  return {
    id: asString(props.id),
    mode: asEnum(RUN_MODES, props.mode, "scrape"),
    triggeredBy: asOptionalString(props.triggered_by),
    startedAt: asString(props.started_at),
    finishedAt: asOptionalString(props.finished_at),
    durationS: duration === null || duration === undefined ? undefined : toNumber(duration),
    articlesFound: toNumber(props.articles_found),
    articlesNew: toNumber(props.articles_new),
    sourcesOk: asStringArray(props.sources_ok),
    sourcesFailed: asStringArray(props.sources_failed),
    error: asOptionalString(props.error),
  };
}

export class Neo4jScrapeRunStore implements ScrapeRunStore {
  constructor(private readonly driver: Driver) {}

  async start(mode: RunMode, startedAt: string, triggeredBy?: string): Promise<string> {
    return withSession(this.driver, "start run", async (session) => {
      const result = await session.executeWrite((tx) =>
        tx.run(
          `CREATE (r:ScrapeRun {
             id: randomUUID(), mode: $mode, triggered_by: $triggeredBy, started_at: $startedAt,
             articles_found: 0, articles_new: 0, sources_ok: [], sources_failed: []
           })
           RETURN r.id AS id`,
          { mode, triggeredBy: triggeredBy ?? null, startedAt },
        ),
      );
      return asString(result.records[0]?.get("id"));
    });
  }

  async finish(id: string, stats: ScrapeRunStats, finishedAt: string): Promise<void> {
    await withSession(this.driver, "finish run", async (session) => {
      await session.executeWrite((tx) =>
        tx.run(
          `MATCH (r:ScrapeRun {id: $id})
           SET r.finished_at = $finishedAt,
               r.duration_s = (datetime($finishedAt).epochMillis - datetime(r.started_at).epochMillis) / 1000.0,
               r.articles_found = $articlesFound,
               r.articles_new = $articlesNew,
               r.sources_ok = $sourcesOk,
               r.sources_failed = $sourcesFailed,
               r.error = $error`,
          {
            id,
            finishedAt,
            articlesFound: int(stats.articlesFound),
            articlesNew: int(stats.articlesNew),
            sourcesOk: stats.sourcesOk,
            sourcesFailed: stats.sourcesFailed,
            error: stats.error ?? null,
          },
        ),
      );
    });
  }

  async latest(mode?: RunMode): Promise<ScrapeRun | null> {
    return (await this.listRecent(1, mode))[0] ?? null;
  }

  async listRecent(limit: number, mode?: RunMode): Promise<ScrapeRun[]> {
    return withSession(this.driver, "list runs", async (session) => {
      const result = await session.executeRead((tx) =>
        tx.run(
          `MATCH (r:ScrapeRun)
           WHERE $mode IS NULL OR r.mode = $mode
           RETURN r
           ORDER BY r.started_at DESC
           LIMIT $limit`,
          { mode: mode ?? null, limit: int(limit) },
        ),
      );
      return result.records.map((rec) => toScrapeRun(nodeProperties(rec, "r")));
    });
  }
}

// ---------------------------------------------------------------------------
// Briefing
// ---------------------------------------------------------------------------

const SectionsSchema = z.object({
  lead: z.string(),
  patterns: z.string(),
  signals: z.string(),
  watchlist: z.array(z.string()),
  data: z.array(z.string()),
});

const EMPTY_SECTIONS: BriefingSections = {
  lead: "",
  patterns: "",
  signals: "",
  watchlist: [],
  data: [],
};

function toBriefing(props: Record<string, unknown>): Briefing {
  return {
    id: asString(props.id),
    sections: parseJsonProperty(props.sections, SectionsSchema, EMPTY_SECTIONS),
    text: asString(props.text),
    articleCount: toNumber(props.article_count),
    modelUsed: asString(props.model_used),
    analysisRunId: asString(props.analysis_run_id),
    createdAt: asString(props.created_at),
  };
}

export class Neo4jBriefingStore implements BriefingStore {
  constructor(private readonly driver: Driver) {}

  async insert(briefing: Briefing, queueItems: EnqueueInput[] = []): Promise<void> {
    await withSession(this.driver, "insert briefing", async (session) => {
      await session.executeWrite(async (tx) => {
        await tx.run(
          `CREATE (:Briefing {
             id: $id, sections: $sections, text: $text, article_count: $articleCount,
             model_used: $modelUsed, analysis_run_id: $analysisRunId, created_at: $createdAt
           })`,
          {
            id: briefing.id,
            sections: JSON.stringify(briefing.sections),
            text: briefing.text,
            articleCount: int(briefing.articleCount),
            modelUsed: briefing.modelUsed,
            analysisRunId: briefing.analysisRunId,
            createdAt: briefing.createdAt,
          },
        );
        for (const item of queueItems) {
          await tx.run(CREATE_QUEUE_ITEM, queueItemParams(item, briefing.createdAt));
        }
      });
    });
  }

  async latest(): Promise<Briefing | null> {
    return this.findOne(`MATCH (b:Briefing) RETURN b ORDER BY b.created_at DESC LIMIT 1`, {});
  }

  async forDate(date: string): Promise<Briefing | null> {
    return this.findOne(
      `MATCH (b:Briefing)
       WHERE b.created_at STARTS WITH $date
       RETURN b
       ORDER BY b.created_at DESC
       LIMIT 1`,
      { date },
    );
  }

  private async findOne(
    query: string,
    params: Record<string, unknown>,
  ): Promise<Briefing | null> {
    return withSession(this.driver, "get briefing", async (session) => {
      const result = await session.executeRead((tx) => tx.run(query, params));
      const record = result.records[0];
      return record ? toBriefing(nodeProperties(record, "b")) : null;
    });
  }
}

// ---------------------------------------------------------------------------
// AnalysisRun
// ---------------------------------------------------------------------------

const ANALYSIS_STATUSES = ["completed", "failed", "skipped"] as const;

function toAnalysisRun(props: Record<string, unknown>): AnalysisRun {
  return {
    id: asString(props.id),
    model: asString(props.model),
    inputArticleIds: asStringArray(props.input_article_ids),
    articlesConsumed: toNumber(props.articles_consumed),
    briefingId: asOptionalString(props.briefing_id),
    briefingText: asOptionalString(props.briefing_text),
    status: asEnum(ANALYSIS_STATUSES, props.status, "failed"),
    errors: asStringArray(props.errors),
    createdAt: asString(props.created_at),
  };
}

export class Neo4jAnalysisRunStore implements AnalysisRunStore {
  constructor(private readonly driver: Driver) {}

  /** CREATE, never MERGE: a run is written exactly once */
  async insert(run: AnalysisRun): Promise<void> {
    await withSession(this.driver, "insert analysis run", async (session) => {
      await session.executeWrite((tx) =>
        tx.run(
          `CREATE (:AnalysisRun {
             id: $id, model: $model, input_article_ids: $inputArticleIds,
             articles_consumed: $articlesConsumed, briefing_id: $briefingId,
             briefing_text: $briefingText, status: $status, errors: $errors,
             created_at: $createdAt
           })`,
          {
            id: run.id,
            model: run.model,
            inputArticleIds: run.inputArticleIds,
            articlesConsumed: int(run.articlesConsumed),
            briefingId: run.briefingId ?? null,
            briefingText: run.briefingText ?? null,
            status: run.status,
            errors: run.errors,
            createdAt: run.createdAt,
          },
        ),
      );
    });
  }

  async listRecent(limit: number): Promise<AnalysisRun[]> {
    return withSession(this.driver, "list analysis runs", async (session) => {
      const result = await session.executeRead((tx) =>
        tx.run(
          `MATCH (r:AnalysisRun) RETURN r ORDER BY r.created_at DESC LIMIT $limit`,
          { limit: int(limit) },
        ),
      );
      return result.records.map((rec) => toAnalysisRun(nodeProperties(rec, "r")));
    });
  }
}
