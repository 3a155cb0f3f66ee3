/**
 * NewsPulse — Feed Item Types
 *
 * Canonical item shape shared by the fetcher, the store and the read API.
 * Every feed entry is normalized to this format before it is merged.
 */

import { z } from 'zod';

// ============================================================
// FEED SOURCE CONFIGURATION
// ============================================================

export const FeedSourceConfigSchema = z.object({
  name: z.string().trim().min(1),
  url: z.string().url(),
});
export type FeedSourceConfig = z.infer<typeof FeedSourceConfigSchema>;

export const FeedSourceListSchema = z.array(FeedSourceConfigSchema).min(1);

// ============================================================
// ITEM
// ============================================================

/**
 * One normalized piece of aggregated content.
 * Items are frozen on construction and never mutated afterwards.
 */
export interface Item {
  /** Dedup key: entry id, guid, permalink or a generated fallback */
  readonly identity: string;
  readonly source: string;
  readonly title: string;
  readonly link: string;
  /** May contain markup; not sanitized */
  readonly summary: string;
  /** UTC instant; fetch time when the feed gave none */
  readonly published: Date;
}

/**
 * Wire form of an Item, `published` as ISO-8601.
 */
export interface SerializedItem {
  identity: string;
  source: string;
  title: string;
  link: string;
  summary: string;
  published: string;
}

/**
 * Raw entry fields the normalizer reads.
 * Structurally compatible with rss-parser's item output.
 */
export interface FeedEntry {
  id?: string;
  guid?: string;
  link?: string;
  title?: string;
  summary?: string;
  content?: string;
  /** Raw Atom <published> text */
  published?: string;
  /** Raw Atom <updated> text */
  updated?: string;
  /** Raw RSS <pubDate> text */
  pubDate?: string;
  /** rss-parser's own conversion, read in host local time */
  isoDate?: string;
}

// ============================================================
// FETCH RESULTS
// ============================================================

/**
 * Outcome of fetching one source in one refresh cycle.
 */
export type SourceFetchResult =
  | {
      ok: true;
      source: string;
      items: Item[];
      durationMs: number;
    }
  | {
      ok: false;
      source: string;
      error: string;
      durationMs: number;
    };

export interface MergeStats {
  inserted: number;
  updated: number;
  ignored: number;
}

export interface SourceSummary {
  source: string;
  ok: boolean;
  items: number;
  durationMs: number;
  error?: string;
}

/**
 * Summary of one completed refresh cycle.
 */
export interface RefreshReport extends MergeStats {
  startedAt: string;
  completedAt: string;
  durationMs: number;
  sources: SourceSummary[];
  /** Items received across all successful sources */
  fetched: number;
  evicted: number;
  storeSize: number;
  errors: string[];
}
