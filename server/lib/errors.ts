export type ArrivalsErrorCode =
  | 'FETCH_FAILED'
  | 'DECODE_FAILED'
  | 'STOP_NOT_FOUND'
  | 'SNAPSHOT_NOT_FOUND';

/**
 * Base class for failures that end one request cycle. None of them are fatal to the process;
 * route handlers turn them into a JSON error with `httpStatus`.
 */
export class ArrivalsError extends Error {
  constructor(
    message: string,
    readonly code: ArrivalsErrorCode,
    readonly httpStatus: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

// Network failure or non-200 from the static archive or a realtime feed
export class FetchError extends ArrivalsError {
  constructor(message: string, readonly url: string, readonly status?: number, options?: { cause?: unknown }) {
    super(message, 'FETCH_FAILED', 502, options);
  }
}

export class DecodeError extends ArrivalsError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'DECODE_FAILED', 502, options);
  }
}

export class StopNotFoundError extends ArrivalsError {
  constructor(readonly stopName: string) {
    super(`Stop "${stopName}" not found in GTFS data`, 'STOP_NOT_FOUND', 404);
  }
}

export class SnapshotNotFoundError extends ArrivalsError {
  constructor(readonly snapshotId: string) {
    super(`Feed snapshot "${snapshotId}" is unknown or has expired`, 'SNAPSHOT_NOT_FOUND', 404);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
