import axios, { type AxiosResponse } from 'axios';
import GtfsRealtimeBindings from 'gtfs-realtime-bindings';
import type { transit_realtime } from 'gtfs-realtime-bindings';
import { FEED_URLS } from '@shared/constants';
import type { LineGroup } from '@shared/types';
import { DecodeError, FetchError, errorMessage } from '../lib/errors.js';

const { FeedMessage, TripDescriptor } = GtfsRealtimeBindings.transit_realtime;

export interface StopTimeUpdateRecord {
  stopId: string;
  arrival?: number; // epoch seconds
}

export interface TripUpdateRecord {
  routeId: string;
  tripId: string;
  // Only set when the feed carries the field
  scheduleRelationship?: string;
  stopTimeUpdates: StopTimeUpdateRecord[];
}

export interface FeedEntityRecord {
  id: string;
  tripUpdate?: TripUpdateRecord;
}

/**
 * One decoded fetch of a realtime feed. Never mutated after decoding.
 */
export interface FeedSnapshot {
  fetchedAt: number; // epoch seconds
  headerTimestamp?: number;
  entities: readonly FeedEntityRecord[];
}

export type FeedFetcher = (line: LineGroup) => Promise<Uint8Array>;

type LongLike = number | { toNumber(): number };

function hasField(message: object, field: string): boolean {
  return Object.prototype.hasOwnProperty.call(message, field);
}

function toEpochSeconds(value: LongLike | null | undefined): number | undefined {
  if (value === null || value === undefined) return undefined;
  return typeof value === 'number' ? value : value.toNumber();
}

function toStopTimeUpdate(update: transit_realtime.TripUpdate.IStopTimeUpdate): StopTimeUpdateRecord {
  const arrival = update.arrival && hasField(update.arrival, 'time')
    ? toEpochSeconds(update.arrival.time)
    : undefined;
  return { stopId: update.stopId ?? '', arrival };
}

// Values newer than the bindings' enum keep their number as the name
function relationshipName(value: number): string {
  const name: string | undefined = TripDescriptor.ScheduleRelationship[value];
  return name ?? String(value);
}

function toTripUpdate(tripUpdate: transit_realtime.ITripUpdate): TripUpdateRecord {
  const trip = tripUpdate.trip;
  const relationship = hasField(trip, 'scheduleRelationship') && trip.scheduleRelationship != null
    ? relationshipName(trip.scheduleRelationship)
    : undefined;

  return {
    routeId: trip.routeId ?? '',
    tripId: trip.tripId ?? '',
    scheduleRelationship: relationship,
    stopTimeUpdates: (tripUpdate.stopTimeUpdate ?? []).map(toStopTimeUpdate),
  };
}

/**
 * Decode a GTFS-Realtime FeedMessage into plain records.
 * Throws DecodeError for anything protobuf cannot read, including a missing required header.
 */
export function decodeFeed(bytes: Uint8Array, fetchedAt: number = Math.floor(Date.now() / 1000)): FeedSnapshot {
  let message: transit_realtime.FeedMessage;
  try {
    message = FeedMessage.decode(bytes);
  } catch (error) {
    throw new DecodeError(`Malformed realtime feed: ${errorMessage(error)}`, { cause: error });
  }

  const entities = message.entity.map((entity): FeedEntityRecord => ({
    id: entity.id,
    tripUpdate: entity.tripUpdate ? toTripUpdate(entity.tripUpdate) : undefined,
  }));

  return {
    fetchedAt,
    headerTimestamp: hasField(message.header, 'timestamp') ? toEpochSeconds(message.header.timestamp) : undefined,
    entities,
  };
}

export interface FeedRequestOptions {
  apiKey?: string;
  timeoutMs: number;
}

/**
 * Fetch the raw protobuf payload for one feed URL. Non-200 is a FetchError; no retry here.
 */
export async function fetchFeedBytes(url: string, options: FeedRequestOptions): Promise<Uint8Array> {
  const headers: Record<string, string> = {};
  if (options.apiKey) {
    headers['x-api-key'] = options.apiKey;
  }

  let response: AxiosResponse<ArrayBuffer>;
  try {
    response = await axios.get<ArrayBuffer>(url, {
      responseType: 'arraybuffer',
      timeout: options.timeoutMs,
      headers,
      validateStatus: () => true,
    });
  } catch (error) {
    throw new FetchError(`Error fetching feed: ${errorMessage(error)}`, url, undefined, { cause: error });
  }

  if (response.status !== 200) {
    throw new FetchError(`Error fetching feed: HTTP ${response.status}`, url, response.status);
  }

  const bytes = new Uint8Array(response.data);
  console.log(`[REALTIME] Raw buffer size: ${bytes.byteLength} bytes`);
  return bytes;
}

export function createFeedFetcher(options: FeedRequestOptions): FeedFetcher {
  return (line) => fetchFeedBytes(FEED_URLS[line], options);
}
