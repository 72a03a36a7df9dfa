import { MTA_API } from '@shared/config';

export interface ServerConfig {
  port: number;
  staticGtfsUrl: string;
  mtaApiKey?: string;
  requestTimeoutMs: number;
  snapshotTtlMs: number;
  maxSnapshots: number;
}

// Snapshots only need to outlive the gap between a search and a trip click
export const DEFAULT_SNAPSHOT_TTL = 10 * 60 * 1000; // 10 minutes
export const DEFAULT_MAX_SNAPSHOTS = 50;
export const DEFAULT_REQUEST_TIMEOUT = 30 * 1000; // static archive is ~5MB

function readNumber(value: string | undefined, fallback: number): number {
  const parsed = Number(value);
  return value && Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

/**
 * Read server settings from the environment (dotenv has already run by the time this is called).
 */
export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return {
    port: readNumber(env.PORT, 3001),
    staticGtfsUrl: env.STATIC_GTFS_URL || MTA_API.STATIC_GTFS_URL,
    mtaApiKey: env.MTA_API_KEY || undefined,
    requestTimeoutMs: readNumber(env.REQUEST_TIMEOUT_MS, DEFAULT_REQUEST_TIMEOUT),
    snapshotTtlMs: readNumber(env.SNAPSHOT_TTL_MS, DEFAULT_SNAPSHOT_TTL),
    maxSnapshots: readNumber(env.MAX_SNAPSHOTS, DEFAULT_MAX_SNAPSHOTS),
  };
}
