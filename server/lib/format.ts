import { NYC_TIMEZONE } from '@shared/config';
import { ARRIVAL_COLUMNS } from '@shared/constants';
import type { ArrivalRecord, ArrivalRow, TripPathRow, TripPathStop } from '@shared/types';

/**
 * Format epoch seconds as "hh:mm:ss AM" in the given timezone.
 * Built from parts because newer ICU data puts a narrow no-break space before AM/PM.
 */
export function formatClockTime(epochSeconds: number, timeZone: string = NYC_TIMEZONE): string {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hour12: true,
  }).formatToParts(new Date(epochSeconds * 1000));

  const part = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find(p => p.type === type)?.value ?? '';

  return `${part('hour')}:${part('minute')}:${part('second')} ${part('dayPeriod').toUpperCase()}`;
}

export function formatMinutesAway(minutes: number): string {
  return `${minutes} min`;
}

export function toArrivalRow(record: ArrivalRecord, timeZone: string = NYC_TIMEZONE): ArrivalRow {
  return {
    train: record.train,
    from: record.from,
    to: record.to,
    arrivalTime: formatClockTime(record.originArrival, timeZone),
    arrivingIn: formatMinutesAway(record.minutesAway),
    destinationArrivalTime: formatClockTime(record.destinationArrival, timeZone),
    status: record.status,
    tripId: record.tripId,
    headsign: record.headsign ?? null,
  };
}

// Keys the row by its display column header, for console.table and CSV-style output
export function toLabeledRow(row: ArrivalRow): Record<string, string> {
  return {
    [ARRIVAL_COLUMNS.train]: row.train,
    [ARRIVAL_COLUMNS.from]: row.from,
    [ARRIVAL_COLUMNS.to]: row.to,
    [ARRIVAL_COLUMNS.arrivalTime]: row.arrivalTime,
    [ARRIVAL_COLUMNS.arrivingIn]: row.arrivingIn,
    [ARRIVAL_COLUMNS.destinationArrivalTime]: row.destinationArrivalTime,
    [ARRIVAL_COLUMNS.status]: row.status,
    [ARRIVAL_COLUMNS.tripId]: row.tripId,
  };
}

export function toTripPathRow(stop: TripPathStop, timeZone: string = NYC_TIMEZONE): TripPathRow {
  return { ...stop, arrivalTime: formatClockTime(stop.arrival, timeZone) };
}
