export const MTA_API = {
  STATIC_GTFS_URL: 'http://web.mta.info/developers/data/nyct/subway/google_transit.zip',
  REALTIME_BASE_URL: 'https://api-endpoint.mta.info/Dataservice/mtagtfsfeeds',
};

// All subway arrivals are shown in New York local time
export const NYC_TIMEZONE = 'America/New_York';
