/**
 * NewsPulse — Merge Engine
 *
 * Folds a batch of freshly fetched items into a store map, keyed by
 * identity. A stored item is only replaced by a strictly newer version,
 * so the result does not depend on the order batches arrive in.
 */

import type { Item, MergeStats } from '../types';

/**
 * Merge one batch into `target`. Mutates `target`; no other side effects.
 */
export function mergeItems(target: Map<string, Item>, batch: Iterable<Item>): MergeStats {
  const stats: MergeStats = { inserted: 0, updated: 0, ignored: 0 };

  for (const item of batch) {
    const existing = target.get(item.identity);

    if (!existing) {
      target.set(item.identity, item);
      stats.inserted++;
    } else if (item.published.getTime() > existing.published.getTime()) {
      target.set(item.identity, item);
      stats.updated++;
    } else {
      // Same age or older: keep what is stored
      stats.ignored++;
    }
  }

  return stats;
}

export function addMergeStats(a: MergeStats, b: MergeStats): MergeStats {
  return {
    inserted: a.inserted + b.inserted,
    updated: a.updated + b.updated,
    ignored: a.ignored + b.ignored,
  };
}
