import AdmZip from "adm-zip";
import GtfsRealtimeBindings from "gtfs-realtime-bindings";
import type { transit_realtime } from "gtfs-realtime-bindings";
import { ScheduleIndex } from "../db/schedule-index.js";
import { GTFS_FILES, readGtfsArchive } from "../db/gtfs-loader.js";
import type { FeedSnapshot, TripUpdateRecord } from "../db/realtime-feed.js";

// 2023-11-14 22:13:20 UTC, 5:13:20 PM in New York
export const NOW = 1_700_000_000;

export const ROUTES_CSV = `route_id,agency_id,route_short_name
1,MTA NYCT,1
2,MTA NYCT,2
A,MTA NYCT,A
GS,MTA NYCT,S
FS,MTA NYCT,S
`;

export const TRIPS_CSV = `route_id,trip_id,service_id,trip_headsign
1,T1-WKD_001_1..S03R,Weekday,South Ferry
1,T1-WKD_002_1..N03R,Weekday,Van Cortlandt Park-242 St
2,T2-WKD_003_2..S01R,Weekday,Flatbush Av-Brooklyn College
A,TA-WKD_004_A..S,Weekday,
GS,TGS-WKD_005_GS.N,Weekday,Grand Central
`;

export const STOP_TIMES_CSV = `trip_id,arrival_time,departure_time,stop_id,stop_sequence
T1-WKD_001_1..S03R,06:00:00,06:00:00,101S,1
T1-WKD_001_1..S03R,06:03:00,06:03:00,104S,2
T1-WKD_001_1..S03R,06:20:00,06:20:00,127S,3
T1-WKD_002_1..N03R,07:00:00,07:00:00,127N,1
T1-WKD_002_1..N03R,07:17:00,07:17:00,104N,2
T1-WKD_002_1..N03R,07:20:00,07:20:00,101N,3
T2-WKD_003_2..S01R,08:00:00,08:00:00,127S,1
TA-WKD_004_A..S,09:00:00,09:00:00,A27S,1
TGS-WKD_005_GS.N,10:00:00,10:00:00,902,1
TGS-WKD_005_GS.N,10:02:00,10:02:00,901,2
`;

export const STOPS_CSV = `stop_id,stop_name,stop_lat,stop_lon
101,Van Cortlandt Park-242 St,40.889248,-73.898583
101N,Van Cortlandt Park-242 St,40.889248,-73.898583
101S,Van Cortlandt Park-242 St,40.889248,-73.898583
104,231 St,40.878856,-73.904834
104N,231 St,40.878856,-73.904834
104S,231 St,40.878856,-73.904834
127,Times Sq-42 St,40.75529,-73.987495
127N,Times Sq-42 St,40.75529,-73.987495
127S,Times Sq-42 St,40.75529,-73.987495
A27,42 St-Port Authority Bus Terminal,,
A27S,42 St-Port Authority Bus Terminal,,
901,Grand Central-42 St,40.752769,-73.979189
902,Times Sq-42 St,40.755983,-73.986229
`;

export function buildArchive(files: Record<string, string> = {
  [GTFS_FILES.routes]: ROUTES_CSV,
  [GTFS_FILES.trips]: TRIPS_CSV,
  [GTFS_FILES.stopTimes]: STOP_TIMES_CSV,
  [GTFS_FILES.stops]: STOPS_CSV,
}): Buffer {
  const zip = new AdmZip();
  for (const [name, content] of Object.entries(files)) {
    zip.addFile(name, Buffer.from(content, "utf8"));
  }
  return zip.toBuffer();
}

export function buildIndex(): ScheduleIndex {
  return ScheduleIndex.fromTables(readGtfsArchive(buildArchive()));
}

export function tripUpdate(
  tripId: string,
  routeId: string,
  updates: Array<[stopId: string, arrival?: number]>,
  scheduleRelationship?: string
): TripUpdateRecord {
  return {
    routeId,
    tripId,
    scheduleRelationship,
    stopTimeUpdates: updates.map(([stopId, arrival]) => ({ stopId, arrival })),
  };
}

export function snapshotOf(...tripUpdates: TripUpdateRecord[]): FeedSnapshot {
  return {
    fetchedAt: NOW,
    headerTimestamp: NOW,
    entities: tripUpdates.map((update, i) => ({ id: String(i + 1), tripUpdate: update })),
  };
}

export function encodeFeed(entities: transit_realtime.IFeedEntity[], timestamp: number = NOW): Uint8Array {
  const { FeedMessage } = GtfsRealtimeBindings.transit_realtime;
  const message = FeedMessage.create({
    header: { gtfsRealtimeVersion: "2.0", timestamp },
    entity: entities,
  });
  return FeedMessage.encode(message).finish();
}
