// =============================================================================
// @tidewire/shared: PublishQueueItem nodes
// =============================================================================
// Every state transition is a compare-and-set in one write transaction:
// `SET q._lock = true` takes the node's write lock before the status is
// re-read, so two concurrent drains can never both move the same item out
// of a given status. publish_log is a list of JSON-encoded entries that is
// only ever appended to.
// =============================================================================

import { z } from "zod";
import type { PublishQueueStore } from "../stores.js";
import {
  PLATFORMS,
  PUBLISH_STATUSES,
  URGENCIES,
  URGENCY_PRIORITY,
  type EnqueueInput,
  type Platform,
  type PublishLogEntry,
  type PublishQueueItem,
  type PublishSettlement,
  type PublishStatus,
} from "../types.js";
import {
  asEnum,
  asOptionalString,
  asString,
  int,
  nodeProperties,
  toNumber,
  withSession,
  type Driver,
} from "./driver.js";

const LOG_OUTCOMES = ["published", "failed", "released", "reclaimed", "skipped"] as const;

const PublishLogEntrySchema = z.object({
  at: z.string(),
  outcome: z.enum(LOG_OUTCOMES),
  platformId: z.string().optional(),
  error: z.string().optional(),
  retryable: z.boolean().optional(),
  fallbackUsed: z.boolean().optional(),
  primaryError: z.string().optional(),
  operator: z.string().optional(),
});

/** Entries that fail to parse are dropped from the returned item only */
export function parsePublishLog(value: unknown): PublishLogEntry[] {
  if (!Array.isArray(value)) return [];
  const entries: PublishLogEntry[] = [];
  for (const raw of value) {
    if (typeof raw !== "string") continue;
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      continue;
    }
    const parsed = PublishLogEntrySchema.safeParse(json);
    if (parsed.success) entries.push(parsed.data);
  }
  return entries;
}

export function toQueueItem(props: Record<string, unknown>): PublishQueueItem {
  const urgency = asEnum(URGENCIES, props.urgency, "medium");
  return {
    id: asString(props.id),
    platform: asEnum(PLATFORMS, props.platform, "devto"),
    title: asOptionalString(props.title),
    body: asString(props.body),
    fallbackBody: asOptionalString(props.fallback_body),
    urgency,
    priority: props.priority === undefined ? URGENCY_PRIORITY[urgency] : toNumber(props.priority),
    language: asOptionalString(props.language) ?? "en",
    status: asEnum(PUBLISH_STATUSES, props.status, "failed"),
    retryCount: toNumber(props.retry_count),
    maxRetries: toNumber(props.max_retries),
    nextRetryAt: asOptionalString(props.next_retry_at) ?? null,
    publishLog: parsePublishLog(props.publish_log),
    publishedAt: asOptionalString(props.published_at),
    platformId: asOptionalString(props.platform_id),
    error: asOptionalString(props.error),
    briefingId: asOptionalString(props.briefing_id),
    articleId: asOptionalString(props.article_id),
    claimedAt: asOptionalString(props.claimed_at),
    createdAt: asString(props.created_at),
  };
}

/** Shared eligibility predicate on `q` at time `$now` */
const ELIGIBLE = `(q.status = 'queued' OR (q.status = 'retry_queued' AND (q.next_retry_at IS NULL OR q.next_retry_at <= $now)))`;

/** Locks `q`, then keeps it only if `condition` still holds */
function lockedWhere(condition: string): string {
  return `SET q._lock = true
          WITH q
          REMOVE q._lock
          WITH q
          WHERE ${condition}`;
}

/** Creates one `queued` item bound to `q`; parameters from queueItemParams */
export const CREATE_QUEUE_ITEM = `CREATE (q:PublishQueueItem {
  id: randomUUID(),
  platform: $platform,
  title: $title,
  body: $body,
  fallback_body: $fallbackBody,
  urgency: $urgency,
  priority: $priority,
  language: $language,
  status: 'queued',
  retry_count: 0,
  max_retries: $maxRetries,
  next_retry_at: null,
  publish_log: [],
  briefing_id: $briefingId,
  article_id: $articleId,
  created_at: $createdAt
})`;

export function queueItemParams(input: EnqueueInput, createdAt: string): Record<string, unknown> {
  return {
    platform: input.platform,
    title: input.title ?? null,
    body: input.body,
    fallbackBody: input.fallbackBody ?? null,
    urgency: input.urgency,
    priority: int(URGENCY_PRIORITY[input.urgency]),
    language: input.language ?? "en",
    maxRetries: int(input.maxRetries),
    briefingId: input.briefingId ?? null,
    articleId: input.articleId ?? null,
    createdAt,
  };
}

export class Neo4jPublishQueueStore implements PublishQueueStore {
  constructor(private readonly driver: Driver) {}

  async enqueue(input: EnqueueInput, createdAt: string): Promise<PublishQueueItem> {
    return withSession(this.driver, "enqueue", async (session) => {
      const result = await session.executeWrite((tx) =>
        tx.run(`${CREATE_QUEUE_ITEM} RETURN q`, queueItemParams(input, createdAt)),
      );
      return toQueueItem(nodeProperties(result.records[0], "q"));
    });
  }

  async get(id: string): Promise<PublishQueueItem | null> {
    return withSession(this.driver, "get queue item", async (session) => {
      const result = await session.executeRead((tx) =>
        tx.run(`MATCH (q:PublishQueueItem {id: $id}) RETURN q`, { id }),
      );
      const record = result.records[0];
      return record ? toQueueItem(nodeProperties(record, "q")) : null;
    });
  }

  async listEligible(
    now: string,
    options: { platform?: Platform; limit: number },
  ): Promise<PublishQueueItem[]> {
    return withSession(this.driver, "list eligible", async (session) => {
      const result = await session.executeRead((tx) =>
        tx.run(
          `MATCH (q:PublishQueueItem)
           WHERE ${ELIGIBLE}
             AND ($platform IS NULL OR q.platform = $platform)
           RETURN q
           ORDER BY q.priority ASC, q.created_at ASC, q.id ASC
           LIMIT $limit`,
          { now, platform: options.platform ?? null, limit: int(options.limit) },
        ),
      );
      return result.records.map((r) => toQueueItem(nodeProperties(r, "q")));
    });
  }

  async claim(id: string, now: string): Promise<PublishQueueItem | null> {
    return withSession(this.driver, "claim", async (session) => {
      const result = await session.executeWrite((tx) =>
        tx.run(
          `MATCH (q:PublishQueueItem {id: $id})
           ${lockedWhere(ELIGIBLE)}
           SET q.status = 'publishing', q.claimed_at = $now
           RETURN q`,
          { id, now },
        ),
      );
      const record = result.records[0];
      return record ? toQueueItem(nodeProperties(record, "q")) : null;
    });
  }

  async settle(id: string, settlement: PublishSettlement): Promise<boolean> {
    return withSession(this.driver, "settle", async (session) => {
      const result = await session.executeWrite((tx) =>
        tx.run(
          `MATCH (q:PublishQueueItem {id: $id})
           ${lockedWhere("q.status = 'publishing'")}
           SET q.status = $status,
               q.retry_count = $retryCount,
               q.next_retry_at = $nextRetryAt,
               q.publish_log = coalesce(q.publish_log, []) + $entry,
               q.platform_id = coalesce($platformId, q.platform_id),
               q.published_at = coalesce($publishedAt, q.published_at),
               q.error = $error
           REMOVE q.claimed_at
           RETURN count(q) AS n`,
          {
            id,
            status: settlement.status,
            retryCount: int(settlement.retryCount),
            nextRetryAt: settlement.nextRetryAt,
            entry: JSON.stringify(settlement.logEntry),
            platformId: settlement.platformId ?? null,
            publishedAt: settlement.publishedAt ?? null,
            error: settlement.error ?? null,
          },
        ),
      );
      return toNumber(result.records[0]?.get("n")) > 0;
    });
  }

  async release(id: string, entry: PublishLogEntry): Promise<boolean> {
    return withSession(this.driver, "release", async (session) => {
      const result = await session.executeWrite((tx) =>
        tx.run(
          `MATCH (q:PublishQueueItem {id: $id})
           ${lockedWhere("q.status = 'publishing'")}
           SET q.status = 'retry_queued',
               q.next_retry_at = null,
               q.publish_log = coalesce(q.publish_log, []) + $entry
           REMOVE q.claimed_at
           RETURN count(q) AS n`,
          { id, entry: JSON.stringify(entry) },
        ),
      );
      return toNumber(result.records[0]?.get("n")) > 0;
    });
  }

  async reclaimStale(claimedBefore: string, now: string): Promise<number> {
    const entry: PublishLogEntry = {
      at: now,
      outcome: "reclaimed",
      error: `claim taken before ${claimedBefore} expired`,
    };
    const stale = "q.status = 'publishing' AND q.claimed_at < $claimedBefore";
    return withSession(this.driver, "reclaim stale", async (session) => {
      const result = await session.executeWrite((tx) =>
        tx.run(
          `MATCH (q:PublishQueueItem)
           WHERE ${stale}
           ${lockedWhere(stale)}
           SET q.status = 'retry_queued',
               q.next_retry_at = null,
               q.publish_log = coalesce(q.publish_log, []) + $entry
           REMOVE q.claimed_at
           RETURN count(q) AS n`,
          { claimedBefore, entry: JSON.stringify(entry) },
        ),
      );
      return toNumber(result.records[0]?.get("n"));
    });
  }

  async skip(id: string, reason: string, now: string, operator?: string): Promise<boolean> {
    const entry: PublishLogEntry = { at: now, outcome: "skipped", error: reason, operator };
    return withSession(this.driver, "skip", async (session) => {
      const result = await session.executeWrite((tx) =>
        tx.run(
          `MATCH (q:PublishQueueItem {id: $id})
           ${lockedWhere("q.status IN ['queued', 'retry_queued']")}
           SET q.status = 'skipped',
               q.publish_log = coalesce(q.publish_log, []) + $entry
           RETURN count(q) AS n`,
          { id, entry: JSON.stringify(entry) },
        ),
      );
      return toNumber(result.records[0]?.get("n")) > 0;
    });
  }

  async countByStatus(): Promise<Partial<Record<PublishStatus, number>>> {
    return withSession(this.driver, "count queue", async (session) => {
      const result = await session.executeRead((tx) =>
        tx.run(`MATCH (q:PublishQueueItem) RETURN q.status AS status, count(*) AS n`),
      );
      const counts: Partial<Record<PublishStatus, number>> = {};
      for (const record of result.records) {
        const status = asEnum(PUBLISH_STATUSES, record.get("status"), "failed");
        counts[status] = (counts[status] ?? 0) + toNumber(record.get("n"));
      }
      return counts;
    });
  }

  async countPublishedSince(since: string): Promise<number> {
    return withSession(this.driver, "count published", async (session) => {
      const result = await session.executeRead((tx) =>
        tx.run(
          `MATCH (q:PublishQueueItem {status: 'published'})
           WHERE q.published_at >= $since
           RETURN count(q) AS n`,
          { since },
        ),
      );
      return toNumber(result.records[0]?.get("n"));
    });
  }
}
