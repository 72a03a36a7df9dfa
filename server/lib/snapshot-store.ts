import type { LineGroup } from '@shared/types';
import type { FeedSnapshot } from '../db/realtime-feed.js';
import { SnapshotNotFoundError } from './errors.js';

export interface StoredSnapshot {
  id: string;
  line: LineGroup;
  snapshot: FeedSnapshot;
  storedAt: number; // ms
}

/**
 * Keeps decoded feed snapshots so a trip-path lookup reads the same snapshot its arrivals
 * came from instead of fetching the feed again.
 */
export class SnapshotStore {
  private entries = new Map<string, StoredSnapshot>();

  constructor(
    private readonly ttlMs: number,
    private readonly maxEntries: number,
    private readonly clock: () => number = Date.now
  ) {}

  save(line: LineGroup, snapshot: FeedSnapshot): string {
    this.prune();

    const id = `${this.clock()}-${Math.random().toString(36).slice(2, 11)}`;
    this.entries.set(id, { id, line, snapshot, storedAt: this.clock() });

    // Map keeps insertion order, so the first key is the oldest
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
    return id;
  }

  get(id: string): StoredSnapshot | undefined {
    const entry = this.entries.get(id);
    if (!entry) return undefined;
    if (this.isExpired(entry)) {
      this.entries.delete(id);
      return undefined;
    }
    return entry;
  }

  require(id: string): StoredSnapshot {
    const entry = this.get(id);
    if (!entry) {
      throw new SnapshotNotFoundError(id);
    }
    return entry;
  }

  get size(): number {
    return this.entries.size;
  }

  private isExpired(entry: StoredSnapshot): boolean {
    return this.clock() - entry.storedAt > this.ttlMs;
  }

  private prune(): void {
    for (const [id, entry] of this.entries) {
      if (this.isExpired(entry)) this.entries.delete(id);
    }
  }
}
