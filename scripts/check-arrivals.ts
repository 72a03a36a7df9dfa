import "dotenv/config";
import { DEFAULT_LINE_GROUP, LINE_GROUPS, isLineGroup } from "@shared/constants";
import { loadServerConfig } from "../server/config.js";
import { loadScheduleIndex } from "../server/db/gtfs-loader.js";
import { stopsForLine } from "../server/db/line-stops.js";
import { createFeedFetcher, decodeFeed } from "../server/db/realtime-feed.js";
import { matchArrivals, sortBySoonest } from "../server/db/arrival-matcher.js";
import { toArrivalRow, toLabeledRow } from "../server/lib/format.js";
import { errorMessage } from "../server/lib/errors.js";

// Usage: npm run check:arrivals -- <line> [from] [to]
// Without stations, lists the stops of the line.
async function checkArrivals() {
  const [lineArg = DEFAULT_LINE_GROUP, from, to] = process.argv.slice(2);
  if (!isLineGroup(lineArg)) {
    console.error(`❌ Unknown line "${lineArg}". Choose one of: ${LINE_GROUPS.join(", ")}`);
    process.exitCode = 1;
    return;
  }

  const config = loadServerConfig();

  try {
    const index = await loadScheduleIndex(config.staticGtfsUrl, config.requestTimeoutMs);

    if (!from || !to) {
      const stops = stopsForLine(index, lineArg);
      console.log(`\n${stops.length} stops on ${lineArg}:`);
      stops.forEach(stop => console.log(`  ${stop.stopId.padEnd(6)} ${stop.stopName}`));
      return;
    }

    const fetchFeed = createFeedFetcher({ apiKey: config.mtaApiKey, timeoutMs: config.requestTimeoutMs });
    const feed = decodeFeed(await fetchFeed(lineArg));
    console.log(`Parsed ${feed.entities.length} entities from ${lineArg} feed`);

    const now = Math.floor(Date.now() / 1000);
    const records = sortBySoonest(matchArrivals(index, feed, from, to, now));
    if (records.length === 0) {
      console.log("⚠️  No upcoming trains found between selected stops.");
      return;
    }

    console.log(`✅ ${records.length} upcoming trains from ${from} to ${to}:`);
    console.table(records.map(record => toLabeledRow(toArrivalRow(record))));
  } catch (error) {
    console.error("❌ Error:", errorMessage(error));
    process.exitCode = 1;
  }
}

checkArrivals().catch((error) => {
  console.error("❌ Fatal error:", error);
  process.exit(1);
});
