/**
 * NewsPulse — Query Service
 *
 * Read side of the store. Every call works on one committed snapshot.
 */

import type { Item, RefreshReport } from '../types';
import { selectNewest } from './retention';
import type { ItemStore } from './store';

export interface QueryConfig {
  /** Limit used when the caller gives none */
  defaultLimit: number;
}

export interface StoreStats {
  items: number;
  bySource: Record<string, number>;
  lastUpdatedAt: string | null;
  lastRefresh: RefreshReport | null;
}

export class FeedQueryService {
  constructor(
    private readonly store: ItemStore,
    private readonly config: QueryConfig,
    private readonly lastRefresh: () => RefreshReport | null = () => null
  ) {}

  get defaultLimit(): number {
    return this.config.defaultLimit;
  }

  /**
   * The `limit` newest items, newest first. Fewer when the store is smaller.
   */
  latest(limit: number = this.config.defaultLimit): Item[] {
    return selectNewest(this.store.snapshot().values(), limit);
  }

  /**
   * Same ordering, restricted to one source.
   */
  latestBySource(source: string, limit: number = this.config.defaultLimit): Item[] {
    return selectNewest(itemsFrom(this.store.snapshot(), source), limit);
  }

  stats(): StoreStats {
    const snapshot = this.store.snapshot();
    const bySource: Record<string, number> = {};

    for (const item of snapshot.values()) {
      bySource[item.source] = (bySource[item.source] ?? 0) + 1;
    }

    return {
      items: snapshot.size,
      bySource,
      lastUpdatedAt: this.store.lastUpdatedAt?.toISOString() ?? null,
      lastRefresh: this.lastRefresh(),
    };
  }
}

function* itemsFrom(snapshot: ReadonlyMap<string, Item>, source: string): Generator<Item> {
  for (const item of snapshot.values()) {
    if (item.source === source) yield item;
  }
}
