/**
 * NewsPulse — Feed Fetcher
 *
 * Retrieves one source's feed over HTTP, parses it with rss-parser and
 * normalizes the entries. Every failure is turned into a per-source
 * result so one bad feed never stops the others.
 */

import Parser from 'rss-parser';
import type { FeedEntry, FeedSourceConfig, Item, SourceFetchResult } from '../types';
import { FeedFetchError, FeedHttpError, FeedTimeoutError } from '../lib/errors';
import { errorMessage, logger } from '../lib/logger';
import { normalizeEntries } from './normalizer';

// ============================================================
// TYPES
// ============================================================

export interface FetcherConfig {
  /** Timeout per source in ms */
  timeoutMs?: number;
  /** Sent with every feed request */
  userAgent?: string;
  /** Maximum entries taken from one feed */
  maxItemsPerSource?: number;
}

interface RawEntryFields {
  id?: string;
  published?: unknown;
  updated?: unknown;
}

const DEFAULT_CONFIG: Required<Omit<FetcherConfig, 'maxItemsPerSource'>> = {
  timeoutMs: 15_000,
  userAgent: 'NewsPulse/1.0',
};

const ACCEPT_HEADER =
  'application/rss+xml, application/atom+xml, application/xml;q=0.9, text/xml;q=0.9, */*;q=0.8';

// rss-parser converts Atom <published>/<updated> with Date#toISOString, which
// throws on a bad value and reads zone-less values in local time. The
// elements are renamed before parsing and read back as raw text.
const ATOM_ROOT = /<feed[\s>]/;
const ATOM_DATE_TAG = /<(\/?)(published|updated)(?=[\s/>])/g;
const RAW_DATE_PREFIX = 'raw-';

export function shieldAtomDates(xml: string): string {
  return ATOM_ROOT.test(xml) ? xml.replace(ATOM_DATE_TAG, `<$1${RAW_DATE_PREFIX}$2`) : xml;
}

function textOf(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'object' && value !== null && '_' in value && typeof value._ === 'string') {
    return value._;
  }
  return undefined;
}

// ============================================================
// FETCHER
// ============================================================

export class FeedFetcher {
  private readonly parser = new Parser<Record<string, unknown>, RawEntryFields>({
    customFields: {
      item: [
        [`${RAW_DATE_PREFIX}published`, 'published'],
        [`${RAW_DATE_PREFIX}updated`, 'updated'],
      ],
    },
  });
  private readonly timeoutMs: number;
  private readonly userAgent: string;
  private readonly maxItemsPerSource?: number;

  constructor(config: FetcherConfig = {}) {
    this.timeoutMs = config.timeoutMs ?? DEFAULT_CONFIG.timeoutMs;
    this.userAgent = config.userAgent ?? DEFAULT_CONFIG.userAgent;
    this.maxItemsPerSource = config.maxItemsPerSource;
  }

  /**
   * Fetch and normalize one source. Never rejects.
   */
  async fetchSource(source: FeedSourceConfig): Promise<SourceFetchResult> {
    const startTime = Date.now();
    const log = logger.child({ source: source.name });

    try {
      const items = await this.fetchWithTimeout(source);
      const durationMs = Date.now() - startTime;

      log.info('Source fetch completed', { items: items.length, durationMs });

      return { ok: true, source: source.name, items, durationMs };
    } catch (error) {
      const durationMs = Date.now() - startTime;
      const message = errorMessage(error);

      log.warn('Source fetch failed', {
        url: source.url,
        error: message,
        durationMs,
      });

      return { ok: false, source: source.name, error: message, durationMs };
    }
  }

  /**
   * Fetch and normalize one source, rejecting on any failure.
   */
  async fetchItems(source: FeedSourceConfig, signal?: AbortSignal): Promise<Item[]> {
    const fetchedAt = new Date();
    const entries = await this.fetchEntries(source, signal);
    const limited =
      this.maxItemsPerSource !== undefined
        ? entries.slice(0, this.maxItemsPerSource)
        : entries;

    return normalizeEntries(limited, source.name, fetchedAt);
  }

  private async fetchWithTimeout(source: FeedSourceConfig): Promise<Item[]> {
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;

    const timeoutPromise = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new FeedTimeoutError(source.name, this.timeoutMs));
      }, this.timeoutMs);
    });

    try {
      return await Promise.race([
        this.fetchItems(source, controller.signal),
        timeoutPromise,
      ]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async fetchEntries(
    source: FeedSourceConfig,
    signal?: AbortSignal
  ): Promise<FeedEntry[]> {
    let response: Response;
    try {
      response = await fetch(source.url, {
        headers: { 'User-Agent': this.userAgent, Accept: ACCEPT_HEADER },
        redirect: 'follow',
        signal,
      });
    } catch (error) {
      throw new FeedFetchError(source.name, `Request failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    if (!response.ok) {
      throw new FeedHttpError(source.name, response.status, response.statusText);
    }

    const body = await response.text();

    try {
      const feed = await this.parser.parseString(shieldAtomDates(body));
      return feed.items.map(item => ({
        id: item.id,
        guid: item.guid,
        link: item.link,
        title: item.title,
        summary: item.summary,
        content: item.content,
        published: textOf(item.published),
        updated: textOf(item.updated),
        pubDate: item.pubDate,
        isoDate: item.isoDate,
      }));
    } catch (error) {
      throw new FeedFetchError(source.name, `Malformed feed: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }
}
