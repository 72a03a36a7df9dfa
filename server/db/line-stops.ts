import type { StopOption } from '@shared/types';
import type { ScheduleIndex } from './schedule-index.js';

function compareNames(a: StopOption, b: StopOption): number {
  if (a.stopName < b.stopName) return -1;
  if (a.stopName > b.stopName) return 1;
  return 0;
}

/**
 * Stations served by a line, one entry per stop name, sorted by name.
 * When several stop IDs share a name the first one in stops.txt order is kept.
 */
export function stopsForLine(index: ScheduleIndex, lineLabel: string): StopOption[] {
  const routeIds = index.routesMatchingLine(lineLabel);
  const tripIds = index.tripsForRoutes(routeIds);
  const stopIds = index.stopIdsForTrips(tripIds);

  const seenNames = new Set<string>();
  const options: StopOption[] = [];
  for (const stop of index.allStops()) {
    if (!stopIds.has(stop.stopId) || seenNames.has(stop.stopName)) continue;
    seenNames.add(stop.stopName);
    options.push({ stopId: stop.stopId, stopName: stop.stopName });
  }

  return options.sort(compareNames);
}
