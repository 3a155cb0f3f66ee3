/**
 * NewsPulse — Feed Normalizer
 *
 * Converts parsed RSS/Atom entries into the canonical Item format:
 * identity resolution, timestamp normalization and field defaults.
 */

import { createHash } from 'crypto';
import type { FeedEntry, Item, SerializedItem } from '../types';
import { logger } from '../lib/logger';

// ============================================================
// IDENTITY
// ============================================================

export const GENERATED_IDENTITY_PREFIX = 'generated:';

function firstNonEmpty(...values: Array<string | undefined>): string | undefined {
  for (const value of values) {
    const trimmed = value?.trim();
    if (trimmed) return trimmed;
  }
  return undefined;
}

/**
 * Derive the dedup key for an entry: entry id, then guid, then permalink.
 * Entries with none of these get a content hash, which only dedups
 * repeats of byte-identical title and summary.
 */
export function deriveIdentity(entry: FeedEntry, source: string): string {
  const explicit = firstNonEmpty(entry.id, entry.guid, entry.link);
  if (explicit) return explicit;

  const hash = createHash('sha256')
    .update(`${source}\n${entry.title ?? ''}\n${entry.summary ?? entry.content ?? ''}`)
    .digest('hex')
    .slice(0, 16);

  logger.debug('Entry has no id, guid or link; using generated identity', {
    source,
    title: entry.title,
    hash,
  });

  return `${GENERATED_IDENTITY_PREFIX}${hash}`;
}

// ============================================================
// TIMESTAMPS
// ============================================================

// Date and time without a zone designator, e.g. 2025-05-01T10:00:00
const NAIVE_ISO_DATETIME = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(:\d{2}(\.\d+)?)?$/;

/**
 * Parse a feed date string into an instant. Returns null when unparseable.
 * Zone-less date-times are read as UTC.
 */
export function parseTimestamp(value: string | undefined): Date | null {
  const trimmed = value?.trim();
  if (!trimmed) return null;

  const text = NAIVE_ISO_DATETIME.test(trimmed)
    ? `${trimmed.replace(' ', 'T')}Z`
    : trimmed;

  const date = new Date(text);
  return Number.isNaN(date.getTime()) ? null : date;
}

/**
 * Resolve the entry's published instant, falling back to the fetch time.
 * Raw feed text wins over `isoDate`, which rss-parser derives in local time.
 */
export function normalizePublished(
  entry: FeedEntry,
  source: string,
  fetchedAt: Date
): Date {
  const candidates = [entry.published, entry.updated, entry.pubDate, entry.isoDate];

  for (const candidate of candidates) {
    const parsed = parseTimestamp(candidate);
    if (parsed) return parsed;
  }

  logger.debug('Entry timestamp missing or unparseable; using fetch time', {
    source,
    title: entry.title,
    raw: firstNonEmpty(...candidates) ?? null,
  });

  return new Date(fetchedAt.getTime());
}

// ============================================================
// ITEMS
// ============================================================

export function createItem(fields: Item): Item {
  return Object.freeze({
    identity: fields.identity,
    source: fields.source,
    title: fields.title,
    link: fields.link,
    summary: fields.summary,
    published: new Date(fields.published.getTime()),
  });
}

/**
 * Normalize one parsed entry.
 */
export function normalizeEntry(entry: FeedEntry, source: string, fetchedAt: Date): Item {
  return createItem({
    identity: deriveIdentity(entry, source),
    source,
    title: entry.title?.trim() ?? '',
    link: entry.link?.trim() ?? '',
    summary: entry.summary ?? entry.content ?? '',
    published: normalizePublished(entry, source, fetchedAt),
  });
}

/**
 * Normalize a batch of entries from one source, all stamped with the same
 * fetch time.
 */
export function normalizeEntries(
  entries: readonly FeedEntry[],
  source: string,
  fetchedAt: Date = new Date()
): Item[] {
  return entries.map(entry => normalizeEntry(entry, source, fetchedAt));
}

export function serializeItem(item: Item): SerializedItem {
  return {
    identity: item.identity,
    source: item.source,
    title: item.title,
    link: item.link,
    summary: item.summary,
    published: item.published.toISOString(),
  };
}
