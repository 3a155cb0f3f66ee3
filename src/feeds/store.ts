/**
 * NewsPulse — Item Store
 *
 * Owns the current set of retained items. Readers get the committed
 * snapshot; writers build a draft copy and swap it in whole, so a reader
 * never sees a half-merged or half-trimmed state.
 */

import type { Item } from '../types';

export type StoreMutator<T> = (draft: Map<string, Item>) => T;

export class ItemStore {
  private current: ReadonlyMap<string, Item> = new Map();
  private updatedAt: Date | null = null;
  private updating = false;

  /**
   * The committed map. Later updates replace it rather than mutate it.
   */
  snapshot(): ReadonlyMap<string, Item> {
    return this.current;
  }

  get size(): number {
    return this.current.size;
  }

  get lastUpdatedAt(): Date | null {
    return this.updatedAt;
  }

  /**
   * Apply a synchronous mutation to a copy of the snapshot, then commit it.
   * If the mutator throws, the snapshot is left untouched.
   */
  update<T>(mutator: StoreMutator<T>): T {
    if (this.updating) {
      throw new Error('ItemStore.update is not re-entrant');
    }

    this.updating = true;
    try {
      const draft = new Map(this.current);
      const result = mutator(draft);
      this.current = draft;
      this.updatedAt = new Date();
      return result;
    } finally {
      this.updating = false;
    }
  }
}
