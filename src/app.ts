/**
 * NewsPulse — Application Wiring
 *
 * Builds the object graph from a validated config. The store is owned
 * here and handed by reference to the aggregator (writer) and the query
 * service (reader).
 */

import type express from 'express';
import type { AppConfig } from './config';
import {
  FeedAggregator,
  FeedFetcher,
  FeedQueryService,
  ItemStore,
  RefreshScheduler,
  createSourceRegistry,
  type SourceRegistry,
} from './feeds';
import { createApiServer } from './server/api';

export interface NewsPulse {
  registry: SourceRegistry;
  store: ItemStore;
  fetcher: FeedFetcher;
  aggregator: FeedAggregator;
  scheduler: RefreshScheduler;
  query: FeedQueryService;
  api: express.Express;
}

export async function createNewsPulse(config: AppConfig): Promise<NewsPulse> {
  const registry = await createSourceRegistry(config.sourcesFile);
  const store = new ItemStore();

  const fetcher = new FeedFetcher({
    timeoutMs: config.fetchTimeoutMs,
    userAgent: config.userAgent,
    maxItemsPerSource: config.maxItemsPerSource,
  });

  const aggregator = new FeedAggregator(
    { registry, fetcher, store },
    { maxItems: config.maxItems }
  );

  const scheduler = new RefreshScheduler(aggregator, {
    intervalMs: config.refreshIntervalMs,
  });

  const query = new FeedQueryService(
    store,
    { defaultLimit: config.defaultQueryLimit },
    () => aggregator.lastRefresh
  );

  const api = createApiServer({ query, registry, maxLimit: config.maxItems });

  return { registry, store, fetcher, aggregator, scheduler, query, api };
}
