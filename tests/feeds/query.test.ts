/**
 * Tests for the query service.
 */

import { describe, it, expect } from 'vitest';
import { FeedQueryService } from '../../src/feeds/query';
import { ItemStore } from '../../src/feeds/store';
import { mergeItems } from '../../src/feeds/merge';
import type { Item, RefreshReport } from '../../src/types';
import { makeItem } from '../helpers';

function storeWith(items: Item[]): ItemStore {
  const store = new ItemStore();
  store.update(draft => mergeItems(draft, items));
  return store;
}

const ITEMS = [
  makeItem('a', '2025-05-01T00:00:00Z', { source: 'Alpha' }),
  makeItem('b', '2025-05-03T00:00:00Z', { source: 'Beta' }),
  makeItem('c', '2025-05-02T00:00:00Z', { source: 'Alpha' }),
  makeItem('d', '2025-05-04T00:00:00Z', { source: 'Beta' }),
];

describe('FeedQueryService', () => {
  describe('latest', () => {
    it('should return items newest first', () => {
      const query = new FeedQueryService(storeWith(ITEMS), { defaultLimit: 100 });

      expect(query.latest().map(item => item.identity)).toEqual(['d', 'b', 'c', 'a']);
    });

    it('should cap the result at the limit', () => {
      const query = new FeedQueryService(storeWith(ITEMS), { defaultLimit: 100 });

      expect(query.latest(2).map(item => item.identity)).toEqual(['d', 'b']);
    });

    it('should apply the default limit', () => {
      const query = new FeedQueryService(storeWith(ITEMS), { defaultLimit: 3 });

      expect(query.latest()).toHaveLength(3);
      expect(query.defaultLimit).toBe(3);
    });

    it('should return an empty array for an empty store', () => {
      const query = new FeedQueryService(new ItemStore(), { defaultLimit: 100 });

      expect(query.latest()).toEqual([]);
      expect(query.latest(10)).toEqual([]);
    });

    it('should return min(limit, size) items for every limit', () => {
      const query = new FeedQueryService(storeWith(ITEMS), { defaultLimit: 100 });

      for (let limit = 1; limit <= 6; limit++) {
        const result = query.latest(limit);
        expect(result).toHaveLength(Math.min(limit, ITEMS.length));
        for (let i = 1; i < result.length; i++) {
          expect(result[i - 1].published.getTime()).toBeGreaterThanOrEqual(
            result[i].published.getTime()
          );
        }
      }
    });

    it('should see a refresh only after it is committed', () => {
      const store = storeWith(ITEMS.slice(0, 2));
      const query = new FeedQueryService(store, { defaultLimit: 100 });
      let midUpdate: string[] = [];

      store.update(draft => {
        mergeItems(draft, ITEMS.slice(2));
        midUpdate = query.latest().map(item => item.identity);
      });

      expect(midUpdate).toEqual(['b', 'a']);
      expect(query.latest().map(item => item.identity)).toEqual(['d', 'b', 'c', 'a']);
    });
  });

  describe('latestBySource', () => {
    it('should filter to one source and keep the order', () => {
      const query = new FeedQueryService(storeWith(ITEMS), { defaultLimit: 100 });

      expect(query.latestBySource('Alpha').map(item => item.identity)).toEqual(['c', 'a']);
      expect(query.latestBySource('Beta', 1).map(item => item.identity)).toEqual(['d']);
      expect(query.latestBySource('Gamma')).toEqual([]);
    });
  });

  describe('stats', () => {
    it('should count items per source', () => {
      const store = storeWith(ITEMS);
      const query = new FeedQueryService(store, { defaultLimit: 100 });

      const stats = query.stats();
      expect(stats.items).toBe(4);
      expect(stats.bySource).toEqual({ Alpha: 2, Beta: 2 });
      expect(stats.lastUpdatedAt).toBe(store.lastUpdatedAt?.toISOString());
      expect(stats.lastRefresh).toBeNull();
    });

    it('should include the last refresh report when provided', () => {
      const report: RefreshReport = {
        startedAt: '2025-05-01T00:00:00.000Z',
        completedAt: '2025-05-01T00:00:01.000Z',
        durationMs: 1000,
        sources: [],
        fetched: 0,
        inserted: 0,
        updated: 0,
        ignored: 0,
        evicted: 0,
        storeSize: 0,
        errors: [],
      };
      const query = new FeedQueryService(new ItemStore(), { defaultLimit: 100 }, () => report);

      expect(query.stats().lastRefresh).toBe(report);
      expect(query.stats().lastUpdatedAt).toBeNull();
    });
  });
});
