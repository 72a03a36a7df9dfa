import type { ScheduleIndex } from '../db/schedule-index.js';
import { createFeedFetcher, type FeedFetcher } from '../db/realtime-feed.js';
import type { ServerConfig } from '../config.js';
import type { ArrivalsError } from './errors.js';
import { SnapshotStore } from './snapshot-store.js';

export interface ServerContext {
  // Filled in once the static GTFS archive has been indexed
  scheduleIndex?: ScheduleIndex;
  // Set when the archive could not be loaded; routes report it instead of waiting
  scheduleError?: ArrivalsError;
  fetchFeed: FeedFetcher;
  snapshots: SnapshotStore;
  now: () => number; // epoch seconds
}

export function createServerContext(config: ServerConfig): ServerContext {
  return {
    fetchFeed: createFeedFetcher({ apiKey: config.mtaApiKey, timeoutMs: config.requestTimeoutMs }),
    snapshots: new SnapshotStore(config.snapshotTtlMs, config.maxSnapshots),
    now: () => Math.floor(Date.now() / 1000),
  };
}
