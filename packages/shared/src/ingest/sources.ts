// =============================================================================
// @tidewire/shared: Source list and RSS fetcher
// =============================================================================
// A source is a named feed. The fetcher turns one feed into RawRecords; it
// throws on failure and the scrape runner isolates that failure per source.
// =============================================================================

import { readFile } from "node:fs/promises";
import Parser from "rss-parser";
import { z } from "zod";
import { ConfigError, SourceFetchError, errorMessage } from "../errors.js";
import type { RawRecord } from "../types.js";

export const SourceDefinitionSchema = z.object({
  name: z.string().min(1),
  url: z.string().url(),
  language: z.string().min(2).optional(),
  enabled: z.boolean().default(true),
});

export type SourceDefinition = z.infer<typeof SourceDefinitionSchema>;

export interface SourceFetcher {
  fetch(source: SourceDefinition): Promise<RawRecord[]>;
}

/** Reads and validates the JSON source list; disabled entries are dropped */
export async function loadSources(path: string): Promise<SourceDefinition[]> {
  const raw: unknown = JSON.parse(await readFile(path, "utf8"));
  const sources = z.array(SourceDefinitionSchema).parse(raw);

  const seen = new Set<string>();
  for (const source of sources) {
    if (seen.has(source.name)) {
      throw new ConfigError(`Duplicate source name "${source.name}" in ${path}`);
    }
    seen.add(source.name);
  }
  return sources.filter((s) => s.enabled);
}

/** Maps one feed item; items without a title are passed through empty */
export function feedItemToRecord(
  source: string,
  item: Parser.Item,
): RawRecord {
  const published = item.isoDate ?? item.pubDate;
  const publishedMs = published ? Date.parse(published) : NaN;

  return {
    source,
    title: item.title ?? "",
    body: item.contentSnippet ?? item.content ?? "",
    url: item.link,
    externalId: item.guid,
    publishedAt: Number.isNaN(publishedMs)
      ? undefined
      : new Date(publishedMs).toISOString(),
  };
}

export function createRssFetcher(
  parser: Parser = new Parser({ timeout: 10_000 }),
): SourceFetcher {
  return {
    async fetch(source) {
      try {
        const feed = await parser.parseURL(source.url);
        return feed.items.map((item) => feedItemToRecord(source.name, item));
      } catch (error) {
        throw new SourceFetchError(source.name, errorMessage(error), {
          cause: error,
        });
      }
    },
  };
}
