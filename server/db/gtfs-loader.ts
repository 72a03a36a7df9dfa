import AdmZip from 'adm-zip';
import axios, { type AxiosResponse } from 'axios';
import path from 'path';
import { parse } from 'csv-parse/sync';
import { FetchError, errorMessage } from '../lib/errors.js';
import { ScheduleIndex } from './schedule-index.js';

export interface RouteRow {
  route_id: string;
}

export interface TripRow {
  route_id: string;
  trip_id: string;
  trip_headsign?: string;
}

export interface StopTimeRow {
  trip_id: string;
  arrival_time: string;
  departure_time: string;
  stop_id: string;
  stop_sequence: number;
}

export interface StopRow {
  stop_id: string;
  stop_name: string;
  stop_lat: number | null;
  stop_lon: number | null;
}

export interface GtfsTables {
  routes: RouteRow[];
  trips: TripRow[];
  stopTimes: StopTimeRow[];
  stops: StopRow[];
}

export const GTFS_FILES = {
  routes: 'routes.txt',
  trips: 'trips.txt',
  stopTimes: 'stop_times.txt',
  stops: 'stops.txt',
} as const;

type CsvRecord = Record<string, string>;

function isCsvRecord(value: unknown): value is CsvRecord {
  return typeof value === 'object' && value !== null &&
    Object.values(value).every(v => typeof v === 'string');
}

export function parseCSV(content: string): CsvRecord[] {
  const records: unknown = parse(content, {
    columns: (header: string[]) => header.map(h => h.trim()),
    skip_empty_lines: true,
    trim: true,
    bom: true,
    relax_column_count: true,
  });
  if (!Array.isArray(records)) return [];
  return records.filter(isCsvRecord);
}

function parseCoordinate(value: string | undefined): number | null {
  if (!value) return null;
  const parsed = parseFloat(value);
  return Number.isFinite(parsed) ? parsed : null;
}

export function toRouteRows(records: CsvRecord[]): RouteRow[] {
  return records
    .filter(r => r.route_id)
    .map(r => ({ route_id: r.route_id }));
}

export function toTripRows(records: CsvRecord[]): TripRow[] {
  return records
    .filter(r => r.trip_id && r.route_id)
    .map(r => ({
      route_id: r.route_id,
      trip_id: r.trip_id,
      trip_headsign: r.trip_headsign || undefined,
    }));
}

export function toStopTimeRows(records: CsvRecord[]): StopTimeRow[] {
  return records
    .filter(r => r.trip_id && r.stop_id)
    .map(r => ({
      trip_id: r.trip_id,
      arrival_time: r.arrival_time ?? '',
      departure_time: r.departure_time ?? '',
      stop_id: r.stop_id,
      stop_sequence: parseInt(r.stop_sequence ?? '') || 0,
    }));
}

export function toStopRows(records: CsvRecord[]): StopRow[] {
  return records
    .filter(r => r.stop_id)
    .map(r => ({
      stop_id: r.stop_id,
      stop_name: r.stop_name ?? '',
      stop_lat: parseCoordinate(r.stop_lat),
      stop_lon: parseCoordinate(r.stop_lon),
    }));
}

/**
 * Unzip the static GTFS archive and parse the four tables the index needs.
 * Tables may sit at the archive root or inside a single folder.
 */
export function readGtfsArchive(archive: Buffer | Uint8Array, source: string = 'archive'): GtfsTables {
  let zip: AdmZip;
  try {
    zip = new AdmZip(Buffer.from(archive));
  } catch (error) {
    throw new FetchError(`Static GTFS data is not a valid zip: ${errorMessage(error)}`, source, undefined, { cause: error });
  }

  const entries = zip.getEntries();
  const readTable = (fileName: string): CsvRecord[] => {
    const entry = entries.find(e => !e.isDirectory && path.posix.basename(e.entryName) === fileName);
    if (!entry) {
      throw new FetchError(`Static GTFS data is missing ${fileName}`, source);
    }
    return parseCSV(entry.getData().toString('utf8'));
  };

  return {
    routes: toRouteRows(readTable(GTFS_FILES.routes)),
    trips: toTripRows(readTable(GTFS_FILES.trips)),
    stopTimes: toStopTimeRows(readTable(GTFS_FILES.stopTimes)),
    stops: toStopRows(readTable(GTFS_FILES.stops)),
  };
}

/**
 * Download the static GTFS archive. Any non-200 response is a FetchError; there is no retry.
 */
export async function downloadGtfsArchive(url: string, timeoutMs: number): Promise<Buffer> {
  let response: AxiosResponse<ArrayBuffer>;
  try {
    response = await axios.get<ArrayBuffer>(url, {
      responseType: 'arraybuffer',
      timeout: timeoutMs,
      validateStatus: () => true,
    });
  } catch (error) {
    throw new FetchError(`Failed to download GTFS static data: ${errorMessage(error)}`, url, undefined, { cause: error });
  }

  if (response.status !== 200) {
    throw new FetchError(`Failed to download GTFS static data (HTTP ${response.status})`, url, response.status);
  }
  return Buffer.from(response.data);
}

/**
 * Single entry point for building the schedule index: download, unzip, parse, index.
 */
export async function loadScheduleIndex(url: string, timeoutMs: number): Promise<ScheduleIndex> {
  const startTime = Date.now();
  console.log(`📦 [GTFS] Downloading static schedule from ${url}...`);

  const archive = await downloadGtfsArchive(url, timeoutMs);
  console.log(`📦 [GTFS] Archive size: ${archive.byteLength} bytes`);

  const tables = readGtfsArchive(archive, url);
  const index = ScheduleIndex.fromTables(tables);

  const counts = index.tableCounts();
  console.log(`✅ [GTFS] Indexed ${counts.routes} routes, ${counts.trips} trips, ${counts.stopTimes} stop times, ${counts.stops} stops in ${Date.now() - startTime}ms`);
  return index;
}
