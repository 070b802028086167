// =============================================================================
// @tidewire/shared: Raw record normalization
// =============================================================================
// Turns a fetched record into an ArticleCandidate. Pure: no I/O, no clock.
// =============================================================================

import crypto from "node:crypto";
import type { ArticleCandidate, RawRecord } from "../types.js";

export const TITLE_MAX_CHARS = 1000;
export const DEFAULT_BODY_MAX_CHARS = 10_000;

/**
 * Lowercases, strips diacritics and punctuation, collapses whitespace.
 * Letters and digits of every script survive, so CJK titles normalize to
 * themselves minus punctuation.
 */
export function normalizeTitle(title: string): string {
  return title
    .normalize("NFKD")
    .replace(/\p{M}+/gu, "")
    .normalize("NFKC")
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]+/gu, "")
    .replace(/\s+/g, " ")
    .trim();
}

/** Deterministic id for records whose source exposes none */
export function deriveSourceId(
  source: string,
  title: string,
  url?: string,
): string {
  return crypto
    .createHash("sha256")
    .update(`${source}:${url ?? title}`)
    .digest("hex")
    .slice(0, 16);
}

/**
 * Returns null when the title normalizes to nothing; such a record can
 * never take part in exact dedup and is dropped by the caller.
 */
export function normalizeRecord(
  record: RawRecord,
  bodyMaxChars: number = DEFAULT_BODY_MAX_CHARS,
): ArticleCandidate | null {
  const title = record.title.trim();
  const titleNorm = normalizeTitle(title);
  if (!titleNorm) return null;

  const url = record.url?.trim() || undefined;

  return {
    source: record.source,
    sourceId: record.externalId ?? deriveSourceId(record.source, title, url),
    url,
    title: title.slice(0, TITLE_MAX_CHARS),
    titleNorm,
    body: (record.body ?? "").slice(0, bodyMaxChars),
    publishedAt: record.publishedAt,
  };
}
