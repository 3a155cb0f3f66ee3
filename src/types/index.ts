/**
 * NewsPulse — Type Exports
 */

export type {
  FeedSourceConfig,
  Item,
  SerializedItem,
  FeedEntry,
  SourceFetchResult,
  MergeStats,
  SourceSummary,
  RefreshReport,
} from './feed-item';
export { FeedSourceConfigSchema, FeedSourceListSchema } from './feed-item';
