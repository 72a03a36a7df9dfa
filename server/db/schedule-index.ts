import Database from 'better-sqlite3';
import { BASE_CODE_LENGTH, UNKNOWN_STOP } from '@shared/constants';
import { initDatabase } from './schema.js';
import type { GtfsTables } from './gtfs-loader.js';

export interface StopRecord {
  stopId: string;
  stopName: string;
  lat: number | null;
  lon: number | null;
}

export interface TableCounts {
  routes: number;
  trips: number;
  stopTimes: number;
  stops: number;
}

interface StopQueryRow {
  stop_id: string;
  stop_name: string;
  stop_lat: number | null;
  stop_lon: number | null;
}

interface TripQueryRow {
  trip_id: string;
  trip_headsign: string | null;
}

export function baseCode(stopId: string): string {
  return stopId.slice(0, BASE_CODE_LENGTH);
}

/**
 * Turn a line label into the token route IDs are matched on:
 * "1-2-3" -> "1", "gtfs-ace" -> "ace", "B-D-F-M" -> "b".
 */
export function normalizeLineLabel(lineLabel: string): string {
  return lineLabel.toLowerCase().replaceAll('gtfs-', '').split('-')[0];
}

/**
 * Read-only index over the static GTFS tables.
 *
 * Relations live in an in-memory SQLite database that is switched to query-only once loaded;
 * the name and headsign lookups are materialized into Maps at construction time.
 * One instance is built per process and shared by every request.
 */
export class ScheduleIndex {
  readonly loadedAt = new Date();

  private readonly stops: readonly StopRecord[];
  // base code -> name, last row in stops.txt order wins
  private readonly stopNamesByBase = new Map<string, string>();
  // base code -> first matching stop row (used for coordinates)
  private readonly firstStopByBase = new Map<string, StopRecord>();
  private readonly firstStopByName = new Map<string, StopRecord>();
  private readonly headsigns = new Map<string, string | undefined>();
  private readonly tripIds: readonly string[];

  private constructor(private readonly db: Database.Database) {
    this.stops = db.prepare<[], StopQueryRow>(`
      SELECT stop_id, stop_name, stop_lat, stop_lon FROM stops ORDER BY rowid
    `).all().map(row => ({
      stopId: row.stop_id,
      stopName: row.stop_name,
      lat: row.stop_lat,
      lon: row.stop_lon,
    }));

    for (const stop of this.stops) {
      const base = baseCode(stop.stopId);
      this.stopNamesByBase.set(base, stop.stopName);
      if (!this.firstStopByBase.has(base)) this.firstStopByBase.set(base, stop);
      if (!this.firstStopByName.has(stop.stopName)) this.firstStopByName.set(stop.stopName, stop);
    }

    const trips = db.prepare<[], TripQueryRow>(`
      SELECT trip_id, trip_headsign FROM trips ORDER BY rowid
    `).all();
    for (const trip of trips) {
      if (!this.headsigns.has(trip.trip_id)) {
        this.headsigns.set(trip.trip_id, trip.trip_headsign ?? undefined);
      }
    }
    this.tripIds = trips.map(t => t.trip_id);

    db.pragma('query_only = ON');
  }

  static fromTables(tables: GtfsTables): ScheduleIndex {
    const db = initDatabase();

    const insertRoute = db.prepare('INSERT INTO routes (route_id) VALUES (?)');
    const insertTrip = db.prepare('INSERT INTO trips (trip_id, route_id, trip_headsign) VALUES (?, ?, ?)');
    const insertStopTime = db.prepare(`
      INSERT INTO stop_times (trip_id, stop_id, arrival_time, departure_time, stop_sequence)
      VALUES (?, ?, ?, ?, ?)
    `);
    const insertStop = db.prepare('INSERT INTO stops (stop_id, stop_name, stop_lat, stop_lon) VALUES (?, ?, ?, ?)');

    const load = db.transaction((data: GtfsTables) => {
      for (const route of data.routes) {
        insertRoute.run(route.route_id);
      }
      for (const trip of data.trips) {
        insertTrip.run(trip.trip_id, trip.route_id, trip.trip_headsign ?? null);
      }
      for (const st of data.stopTimes) {
        insertStopTime.run(st.trip_id, st.stop_id, st.arrival_time, st.departure_time, st.stop_sequence);
      }
      for (const stop of data.stops) {
        insertStop.run(stop.stop_id, stop.stop_name, stop.stop_lat, stop.stop_lon);
      }
    });
    load(tables);

    return new ScheduleIndex(db);
  }

  /**
   * Routes whose ID contains the normalized line token, case-insensitive.
   * An unmatched label yields an empty set.
   */
  routesMatchingLine(lineLabel: string): Set<string> {
    const token = normalizeLineLabel(lineLabel);
    const rows = this.db.prepare<[string], { route_id: string }>(`
      SELECT route_id FROM routes
      WHERE instr(lower(route_id), ?) > 0
      ORDER BY rowid
    `).all(token);
    return new Set(rows.map(r => r.route_id));
  }

  tripsForRoutes(routeIds: Iterable<string>): Set<string> {
    const rows = this.db.prepare<[string], { trip_id: string }>(`
      SELECT trip_id FROM trips
      WHERE route_id IN (SELECT value FROM json_each(?))
      ORDER BY rowid
    `).all(JSON.stringify(Array.from(routeIds)));
    return new Set(rows.map(r => r.trip_id));
  }

  stopIdsForTrips(tripIds: Iterable<string>): Set<string> {
    const rows = this.db.prepare<[string], { stop_id: string }>(`
      SELECT stop_id FROM stop_times
      WHERE trip_id IN (SELECT value FROM json_each(?))
      ORDER BY rowid
    `).all(JSON.stringify(Array.from(tripIds)));
    return new Set(rows.map(r => r.stop_id));
  }

  stopName(stopBaseCode: string): string {
    return this.stopNamesByBase.get(stopBaseCode) ?? UNKNOWN_STOP;
  }

  /**
   * Exact trip match first, then the first trip (in trips.txt order) whose ID starts with `tripId`.
   */
  headsignForTrip(tripId: string): string | undefined {
    if (this.headsigns.has(tripId)) return this.headsigns.get(tripId);
    if (!tripId) return undefined;

    const prefixMatch = this.tripIds.find(id => id.startsWith(tripId));
    return prefixMatch === undefined ? undefined : this.headsigns.get(prefixMatch);
  }

  findStopByName(stopName: string): StopRecord | undefined {
    return this.firstStopByName.get(stopName);
  }

  stopByBaseCode(stopBaseCode: string): StopRecord | undefined {
    return this.firstStopByBase.get(stopBaseCode);
  }

  allStops(): readonly StopRecord[] {
    return this.stops;
  }

  tableCounts(): TableCounts {
    const count = (table: string): number =>
      this.db.prepare<[], { count: number }>(`SELECT COUNT(*) AS count FROM ${table}`).get()?.count ?? 0;
    return {
      routes: count('routes'),
      trips: count('trips'),
      stopTimes: count('stop_times'),
      stops: count('stops'),
    };
  }

  close(): void {
    this.db.close();
  }
}
