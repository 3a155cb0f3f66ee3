/**
 * NewsPulse — Feed Aggregator
 *
 * Runs one refresh cycle:
 * 1. Fetch every registered source concurrently (each with its own timeout)
 * 2. Merge every successful batch into a draft of the store
 * 3. Trim the draft to the newest MAX_ITEMS
 * 4. Commit the draft as the new snapshot
 */

import type { MergeStats, RefreshReport, SourceFetchResult, SourceSummary } from '../types';
import { logger, timeOperation } from '../lib/logger';
import type { FeedFetcher } from './fetcher';
import { addMergeStats, mergeItems } from './merge';
import type { SourceRegistry } from './registry';
import { trimToNewest } from './retention';
import type { ItemStore } from './store';

// ============================================================
// TYPES
// ============================================================

export interface AggregatorConfig {
  /** Store bound applied after every cycle */
  maxItems: number;
}

export interface AggregatorDeps {
  registry: SourceRegistry;
  fetcher: Pick<FeedFetcher, 'fetchSource'>;
  store: ItemStore;
}

export class RefreshInProgressError extends Error {
  constructor() {
    super('A refresh cycle is already running');
    this.name = 'RefreshInProgressError';
  }
}

// ============================================================
// AGGREGATOR
// ============================================================

export class FeedAggregator {
  private readonly registry: SourceRegistry;
  private readonly fetcher: Pick<FeedFetcher, 'fetchSource'>;
  private readonly store: ItemStore;
  private readonly maxItems: number;
  private running = false;
  private lastReport: RefreshReport | null = null;

  constructor(deps: AggregatorDeps, config: AggregatorConfig) {
    if (!Number.isInteger(config.maxItems) || config.maxItems < 1) {
      throw new RangeError(`maxItems must be a positive integer, got ${config.maxItems}`);
    }
    this.registry = deps.registry;
    this.fetcher = deps.fetcher;
    this.store = deps.store;
    this.maxItems = config.maxItems;
  }

  get isRunning(): boolean {
    return this.running;
  }

  get lastRefresh(): RefreshReport | null {
    return this.lastReport;
  }

  /**
   * Run a full refresh cycle. Source failures are reported, not thrown.
   * Rejects with RefreshInProgressError if a cycle is already running.
   */
  async refresh(): Promise<RefreshReport> {
    if (this.running) {
      throw new RefreshInProgressError();
    }

    this.running = true;
    try {
      const report = await this.runCycle();
      this.lastReport = report;
      return report;
    } finally {
      this.running = false;
    }
  }

  private async runCycle(): Promise<RefreshReport> {
    const startTime = Date.now();
    const startedAt = new Date(startTime).toISOString();
    const sources = this.registry.list();

    logger.info('Starting refresh cycle', { sources: sources.length });

    // Phase 1: fetch concurrently; each result already absorbs its own failure
    const results = await timeOperation('Feed fetch phase', () =>
      Promise.all(sources.map(source => this.fetcher.fetchSource(source)))
    );

    // Phase 2 + 3: merge and trim in one atomic store update
    const batches = results.flatMap(result => (result.ok ? [result.items] : []));
    const { stats, evicted } = this.store.update(draft => {
      let stats: MergeStats = { inserted: 0, updated: 0, ignored: 0 };
      for (const batch of batches) {
        stats = addMergeStats(stats, mergeItems(draft, batch));
      }
      return { stats, evicted: trimToNewest(draft, this.maxItems) };
    });

    const completedAt = Date.now();
    const report: RefreshReport = {
      startedAt,
      completedAt: new Date(completedAt).toISOString(),
      durationMs: completedAt - startTime,
      sources: results.map(summarize),
      fetched: batches.reduce((sum, batch) => sum + batch.length, 0),
      ...stats,
      evicted,
      storeSize: this.store.size,
      errors: results.flatMap(result =>
        result.ok ? [] : [`${result.source}: ${result.error}`]
      ),
    };

    logger.info('Refresh cycle completed', {
      fetched: report.fetched,
      inserted: report.inserted,
      updated: report.updated,
      evicted: report.evicted,
      total: report.storeSize,
      failedSources: report.errors.length,
      durationMs: report.durationMs,
    });

    return report;
  }
}

function summarize(result: SourceFetchResult): SourceSummary {
  return result.ok
    ? { source: result.source, ok: true, items: result.items.length, durationMs: result.durationMs }
    : {
        source: result.source,
        ok: false,
        items: 0,
        durationMs: result.durationMs,
        error: result.error,
      };
}
