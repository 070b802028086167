// =============================================================================
// @tidewire/shared: Publish queue drain
// =============================================================================
// State machine per item:
//
//   queued ──claim──▶ publishing ──ok──▶ published
//      ▲                  │ ├─retryable, retries left──▶ retry_queued ─due─▶ (claim)
//      │                  │ └─otherwise──▶ failed
//      └──── skip ─▶ skipped      (abort / stale claim) ──▶ retry_queued, due now
//
// Items are claimed one at a time with a compare-and-set, so any number of
// drains may run against the same queue; an item is published at most once
// per claim.
// =============================================================================

import { ClaimConflictError } from "../errors.js";
import type { Logger } from "../logger.js";
import type { ArticleStore, PublishQueueStore } from "../stores.js";
import type {
  Platform,
  PublishLogEntry,
  PublishQueueItem,
  PublishSettlement,
} from "../types.js";
import type { AdapterRegistry } from "./adapters/index.js";
import type { PlatformAdapter, PublishResult } from "./adapters/types.js";
import { nextRetryAt, type BackoffPolicy } from "./backoff.js";

export const DEFAULT_DRAIN_LIMIT = 20;

export interface DrainDeps {
  queue: PublishQueueStore;
  articles: ArticleStore;
  adapters: AdapterRegistry;
  logger: Logger;
}

export interface DrainOptions {
  backoff: BackoffPolicy;
  platform?: Platform;
  limit?: number;
  signal?: AbortSignal;
  now?: () => Date;
}

export type DrainItemOutcome =
  | "published"
  | "retry_queued"
  | "failed"
  | "released"
  | "conflict"
  | "unconfigured";

export interface DrainReport {
  considered: number;
  published: number;
  retried: number;
  failed: number;
  fallbackUsed: number;
  conflicts: number;
  unconfigured: number;
  released: number;
  aborted: boolean;
  items: Array<{ id: string; platform: Platform; outcome: DrainItemOutcome; error?: string }>;
}

/**
 * The first attempt is the only one allowed to fall back. Released and
 * reclaimed claims never reached a settlement, so they do not count.
 */
export function isFirstAttempt(item: PublishQueueItem): boolean {
  return (
    item.retryCount === 0 &&
    !item.publishLog.some((e) => e.outcome === "published" || e.outcome === "failed")
  );
}

function canFallBack(item: PublishQueueItem, result: PublishResult): boolean {
  return (
    !result.ok &&
    isFirstAttempt(item) &&
    (result.error.kind === "payload" || result.error.kind === "content_policy") &&
    (item.fallbackBody ?? "").trim().length > 0
  );
}

/**
 * Settlement for one attempt's outcome. Pure; `now` is the settle time.
 */
export function decideSettlement(
  item: PublishQueueItem,
  result: PublishResult,
  now: Date,
  policy: BackoffPolicy,
  primaryError?: string,
): PublishSettlement {
  const at = now.toISOString();

  if (result.ok) {
    const logEntry: PublishLogEntry = {
      at,
      outcome: "published",
      platformId: result.value.platformId,
    };
    if (primaryError !== undefined) {
      logEntry.fallbackUsed = true;
      logEntry.primaryError = primaryError;
    }
    return {
      status: "published",
      retryCount: item.retryCount,
      nextRetryAt: null,
      logEntry,
      platformId: result.value.platformId,
      publishedAt: at,
    };
  }

  const { retryable, message } = result.error;
  const logEntry: PublishLogEntry = { at, outcome: "failed", error: message, retryable };
  if (primaryError !== undefined) logEntry.primaryError = primaryError;

  if (retryable && item.retryCount < item.maxRetries) {
    const retryCount = item.retryCount + 1;
    return {
      status: "retry_queued",
      retryCount,
      nextRetryAt: nextRetryAt(now, retryCount, policy),
      logEntry,
      error: message,
    };
  }

  return {
    status: "failed",
    retryCount: item.retryCount,
    nextRetryAt: null,
    logEntry,
    error: message,
  };
}

async function attempt(
  adapter: PlatformAdapter,
  item: PublishQueueItem,
  body: string,
  signal?: AbortSignal,
): Promise<PublishResult> {
  return adapter.publish({ title: item.title, body, language: item.language }, signal);
}

export async function drainQueue(
  deps: DrainDeps,
  options: DrainOptions,
): Promise<DrainReport> {
  const now = options.now ?? (() => new Date());
  const log = deps.logger.child({ component: "publish" });
  const report: DrainReport = {
    considered: 0,
    published: 0,
    retried: 0,
    failed: 0,
    fallbackUsed: 0,
    conflicts: 0,
    unconfigured: 0,
    released: 0,
    aborted: false,
    items: [],
  };

  const eligible = await deps.queue.listEligible(now().toISOString(), {
    platform: options.platform,
    limit: options.limit ?? DEFAULT_DRAIN_LIMIT,
  });

  for (const candidate of eligible) {
    if (options.signal?.aborted) {
      report.aborted = true;
      break;
    }
    report.considered++;

    const adapter = deps.adapters[candidate.platform];
    if (!adapter) {
      report.unconfigured++;
      report.items.push({ id: candidate.id, platform: candidate.platform, outcome: "unconfigured" });
      continue;
    }

    const item = await deps.queue.claim(candidate.id, now().toISOString());
    if (!item) {
      const conflict = new ClaimConflictError(candidate.id);
      log.debug(conflict.message, { platform: candidate.platform });
      report.conflicts++;
      report.items.push({ id: candidate.id, platform: candidate.platform, outcome: "conflict" });
      continue;
    }

    const release = async (result: PublishResult): Promise<boolean> => {
      if (result.ok || !options.signal?.aborted) return false;
      await deps.queue.release(item.id, {
        at: now().toISOString(),
        outcome: "released",
        error: `aborted: ${result.error.message}`,
      });
      report.released++;
      report.aborted = true;
      report.items.push({ id: item.id, platform: item.platform, outcome: "released" });
      log.warn("Drain aborted, claim released", { id: item.id, platform: item.platform });
      return true;
    };

    let result = await attempt(adapter, item, item.body, options.signal);
    let primaryError: string | undefined;
    if (await release(result)) break;

    if (!result.ok && canFallBack(item, result) && item.fallbackBody) {
      primaryError = result.error.message;
      log.info("Primary body rejected, publishing fallback", {
        id: item.id,
        platform: item.platform,
        kind: result.error.kind,
      });
      result = await attempt(adapter, item, item.fallbackBody, options.signal);
      if (await release(result)) break;
    }

    const settlement = decideSettlement(item, result, now(), options.backoff, primaryError);
    const settled = await deps.queue.settle(item.id, settlement);
    if (!settled) {
      // Claim was taken back (stale reclaim) while the call was in flight
      log.warn("Settlement rejected, claim no longer held", { id: item.id });
      report.conflicts++;
      report.items.push({ id: item.id, platform: item.platform, outcome: "conflict" });
      continue;
    }

    report.items.push({
      id: item.id,
      platform: item.platform,
      outcome: settlement.status,
      error: settlement.error,
    });

    switch (settlement.status) {
      case "published":
        report.published++;
        if (primaryError !== undefined) report.fallbackUsed++;
        if (item.articleId) {
          await deps.articles.advanceStatus([item.articleId], "published");
        }
        log.info("Published", {
          id: item.id,
          platform: item.platform,
          platformId: settlement.platformId,
          fallbackUsed: primaryError !== undefined,
        });
        break;
      case "retry_queued":
        report.retried++;
        log.warn("Publish failed, retry scheduled", {
          id: item.id,
          platform: item.platform,
          retryCount: settlement.retryCount,
          nextRetryAt: settlement.nextRetryAt,
          error: settlement.error,
        });
        break;
      case "failed":
        report.failed++;
        log.error("Publish failed permanently", {
          id: item.id,
          platform: item.platform,
          retryCount: settlement.retryCount,
          error: settlement.error,
        });
        break;
    }
  }

  return report;
}

/** Releases claims older than `claimTimeoutMs`; returns how many */
export async function reclaimStaleClaims(
  queue: PublishQueueStore,
  claimTimeoutMs: number,
  now: Date = new Date(),
): Promise<number> {
  const cutoff = new Date(now.getTime() - claimTimeoutMs).toISOString();
  return queue.reclaimStale(cutoff, now.toISOString());
}

/**
 * Operator skip, logged under the client that asked for it. False when the
 * item is missing or not skippable.
 */
export async function skipQueueItem(
  queue: PublishQueueStore,
  id: string,
  reason: string,
  operator: string,
  now: Date = new Date(),
): Promise<boolean> {
  return queue.skip(id, reason, now.toISOString(), operator);
}
