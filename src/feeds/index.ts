/**
 * NewsPulse — Feeds Module
 *
 * Aggregation engine: source registry, fetcher, merge, retention,
 * store, query service and scheduler.
 */

export {
  SourceRegistry,
  DEFAULT_SOURCES,
  loadSourcesFile,
  createSourceRegistry,
} from './registry';

export {
  deriveIdentity,
  parseTimestamp,
  normalizePublished,
  normalizeEntry,
  normalizeEntries,
  createItem,
  serializeItem,
  GENERATED_IDENTITY_PREFIX,
} from './normalizer';

export { FeedFetcher, type FetcherConfig } from './fetcher';
export { mergeItems, addMergeStats } from './merge';
export { compareNewestFirst, selectNewest, trimToNewest } from './retention';
export { ItemStore, type StoreMutator } from './store';
export { FeedQueryService, type QueryConfig, type StoreStats } from './query';

export {
  FeedAggregator,
  RefreshInProgressError,
  type AggregatorConfig,
  type AggregatorDeps,
} from './aggregator';

export { RefreshScheduler, type Refreshable, type SchedulerConfig } from './scheduler';
