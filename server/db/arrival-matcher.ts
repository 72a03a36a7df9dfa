import type { ArrivalRecord, ArrivalStatus, TripPathStop } from '@shared/types';
import { StopNotFoundError } from '../lib/errors.js';
import { baseCode, type ScheduleIndex } from './schedule-index.js';
import type { FeedSnapshot, StopTimeUpdateRecord, TripUpdateRecord } from './realtime-feed.js';

interface TimedUpdate {
  stopId: string;
  arrival: number;
}

function resolveBaseCode(index: ScheduleIndex, stopName: string): string {
  const stop = index.findStopByName(stopName);
  if (!stop) {
    throw new StopNotFoundError(stopName);
  }
  return baseCode(stop.stopId);
}

function withArrival(update: StopTimeUpdateRecord): TimedUpdate | undefined {
  return update.arrival === undefined ? undefined : { stopId: update.stopId, arrival: update.arrival };
}

function minutesUntil(arrival: number, now: number): number {
  return Math.floor((arrival - now) / 60);
}

/**
 * Coarse proxy: any schedule relationship other than SCHEDULED counts as a delay.
 * The feed carries no scheduled time to compare the prediction against.
 */
export function tripStatus(tripUpdate: TripUpdateRecord): ArrivalStatus {
  const relationship = tripUpdate.scheduleRelationship;
  return relationship !== undefined && relationship !== 'SCHEDULED' ? 'Delayed' : 'On Time';
}

/**
 * Upcoming trains that stop at `startStopName` and later at `endStopName`.
 *
 * For each trip update the first update at each station's base code is used, even if the two
 * come from different directions of travel. A record is kept only when the train has not yet
 * reached the start station and reaches it before the destination.
 * Results follow feed entity order; use {@link sortBySoonest} for display.
 *
 * Station names resolve through the first stop row with that name across all lines, so a name
 * shared by several stations (e.g. "86 St") always maps to the same base code and can find no
 * trains on the other lines. Known limitation, kept from the original behavior.
 */
export function matchArrivals(
  index: ScheduleIndex,
  feed: FeedSnapshot,
  startStopName: string,
  endStopName: string,
  nowEpochSeconds: number
): ArrivalRecord[] {
  const startBase = resolveBaseCode(index, startStopName);
  const endBase = resolveBaseCode(index, endStopName);

  const records: ArrivalRecord[] = [];
  for (const entity of feed.entities) {
    const tripUpdate = entity.tripUpdate;
    if (!tripUpdate) continue;

    let start: TimedUpdate | undefined;
    let end: TimedUpdate | undefined;
    for (const update of tripUpdate.stopTimeUpdates) {
      const timed = withArrival(update);
      if (!timed) continue;
      if (!start && timed.stopId.startsWith(startBase)) start = timed;
      if (!end && timed.stopId.startsWith(endBase)) end = timed;
    }

    if (!start || !end) continue;
    if (start.arrival >= end.arrival) continue;
    if (start.arrival <= nowEpochSeconds) continue;

    records.push({
      train: tripUpdate.routeId,
      from: index.stopName(baseCode(start.stopId)),
      to: index.stopName(baseCode(end.stopId)),
      originArrival: start.arrival,
      destinationArrival: end.arrival,
      minutesAway: minutesUntil(start.arrival, nowEpochSeconds),
      status: tripStatus(tripUpdate),
      tripId: tripUpdate.tripId,
      headsign: index.headsignForTrip(tripUpdate.tripId),
    });
  }

  return records;
}

export function sortBySoonest(records: readonly ArrivalRecord[]): ArrivalRecord[] {
  return [...records].sort((a, b) => a.originArrival - b.originArrival);
}

/**
 * Remaining stops of one trip for the map, taken from the snapshot the trip was found in.
 * Updates without an arrival time or without station coordinates are left out.
 * A trip that is not in the snapshot gives an empty list.
 */
export function stopsForTrip(
  index: ScheduleIndex,
  tripId: string,
  feed: FeedSnapshot,
  nowEpochSeconds: number
): TripPathStop[] {
  const entity = feed.entities.find(e => e.tripUpdate?.tripId === tripId);
  if (!entity?.tripUpdate) return [];

  const path: TripPathStop[] = [];
  for (const update of entity.tripUpdate.stopTimeUpdates) {
    const timed = withArrival(update);
    if (!timed) continue;

    const stop = index.stopByBaseCode(baseCode(timed.stopId));
    if (!stop || stop.lat === null || stop.lon === null) continue;

    path.push({
      stopId: timed.stopId,
      stopName: stop.stopName,
      lat: stop.lat,
      lon: stop.lon,
      arrival: timed.arrival,
      minutesAway: minutesUntil(timed.arrival, nowEpochSeconds),
    });
  }
  return path;
}
