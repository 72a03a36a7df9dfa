import Database from 'better-sqlite3';

/**
 * Create the database holding the static GTFS relations.
 * Defaults to an in-memory database: the schedule is re-downloaded on every start.
 * Insertion order (rowid) is the dataset row order and several lookups depend on it.
 */
export function initDatabase(filename: string = ':memory:'): Database.Database {
  const db = new Database(filename);

  db.exec(`
    CREATE TABLE IF NOT EXISTS routes (
      route_id TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS trips (
      trip_id TEXT NOT NULL,
      route_id TEXT NOT NULL,
      trip_headsign TEXT
    );

    CREATE INDEX IF NOT EXISTS idx_trips_route ON trips(route_id);
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS stop_times (
      trip_id TEXT NOT NULL,
      stop_id TEXT NOT NULL,
      arrival_time TEXT,
      departure_time TEXT,
      stop_sequence INTEGER
    );

    CREATE INDEX IF NOT EXISTS idx_stop_times_trip ON stop_times(trip_id);
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS stops (
      stop_id TEXT NOT NULL,
      stop_name TEXT NOT NULL,
      stop_lat REAL,
      stop_lon REAL
    );
  `);

  return db;
}
