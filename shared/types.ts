export type LineGroup =
  | '1-2-3'
  | '4-5-6'
  | '7'
  | 'A-C-E'
  | 'B-D-F-M'
  | 'G'
  | 'J-Z'
  | 'L'
  | 'N-Q-R-W'
  | 'S';

export type ArrivalStatus = 'On Time' | 'Delayed';

// 'no-results' is a valid empty search, 'feed-error' means the realtime payload could not be read
export type SearchStatus = 'ok' | 'no-results' | 'feed-error';

export interface StopOption {
  stopId: string;
  stopName: string;
}

export interface ArrivalRecord {
  train: string; // route id, e.g. "1" or "GS"
  from: string;
  to: string;
  originArrival: number; // epoch seconds
  destinationArrival: number; // epoch seconds
  minutesAway: number;
  status: ArrivalStatus;
  tripId: string;
  headsign?: string;
}

// ArrivalRecord formatted for the results table
export interface ArrivalRow {
  train: string;
  from: string;
  to: string;
  arrivalTime: string; // hh:mm:ss AM in New York time
  arrivingIn: string;
  destinationArrivalTime: string;
  status: ArrivalStatus;
  tripId: string;
  headsign: string | null;
}

export interface TripPathStop {
  stopId: string;
  stopName: string;
  lat: number;
  lon: number;
  arrival: number; // epoch seconds
  minutesAway: number;
}

export interface TripPathRow extends TripPathStop {
  arrivalTime: string;
}

export interface ArrivalsResponse {
  line: LineGroup;
  snapshotId: string | null;
  status: SearchStatus;
  message?: string;
  arrivals: ArrivalRow[];
}
