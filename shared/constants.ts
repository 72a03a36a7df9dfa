import type { ArrivalRow, LineGroup } from './types';
import { MTA_API } from './config';

export const LINE_GROUPS: LineGroup[] = [
  '1-2-3',
  '4-5-6',
  '7',
  'A-C-E',
  'B-D-F-M',
  'G',
  'J-Z',
  'L',
  'N-Q-R-W',
  'S',
];

export const DEFAULT_LINE_GROUP: LineGroup = '1-2-3';

// Several line groups share the numbered-lines endpoint
export const FEED_URLS: Record<LineGroup, string> = {
  '1-2-3': `${MTA_API.REALTIME_BASE_URL}/nyct%2Fgtfs`,
  '4-5-6': `${MTA_API.REALTIME_BASE_URL}/nyct%2Fgtfs`,
  '7': `${MTA_API.REALTIME_BASE_URL}/nyct%2Fgtfs`,
  'A-C-E': `${MTA_API.REALTIME_BASE_URL}/nyct%2Fgtfs-ace`,
  'B-D-F-M': `${MTA_API.REALTIME_BASE_URL}/nyct%2Fgtfs-bdfm`,
  'G': `${MTA_API.REALTIME_BASE_URL}/nyct%2Fgtfs-g`,
  'J-Z': `${MTA_API.REALTIME_BASE_URL}/nyct%2Fgtfs-jz`,
  'L': `${MTA_API.REALTIME_BASE_URL}/nyct%2Fgtfs-l`,
  'N-Q-R-W': `${MTA_API.REALTIME_BASE_URL}/nyct%2Fgtfs-nqrw`,
  'S': `${MTA_API.REALTIME_BASE_URL}/nyct%2Fgtfs`,
};

export const UNKNOWN_STOP = 'Unknown Stop';

// Length of the station part of a stop ID ("101N" -> "101")
export const BASE_CODE_LENGTH = 3;

// Column headers for the arrivals table, keyed by ArrivalRow field
export const ARRIVAL_COLUMNS: Record<Exclude<keyof ArrivalRow, 'headsign'>, string> = {
  train: 'Train',
  from: 'From',
  to: 'To',
  arrivalTime: 'Arrival Time',
  arrivingIn: 'Arriving In',
  destinationArrivalTime: 'Destination Arrival Time',
  status: 'Status',
  tripId: 'Trip ID',
};

export function isLineGroup(value: string): value is LineGroup {
  return LINE_GROUPS.some(line => line === value);
}
