import axios from "axios";
import express from "express";
import { afterAll, beforeAll, beforeEach, describe, expect, it, vi } from "vitest";
import type { LineGroup } from "@shared/types";
import { registerRoutes } from "./routes.js";
import type { ServerContext } from "./lib/context.js";
import { FetchError } from "./lib/errors.js";
import { SnapshotStore } from "./lib/snapshot-store.js";
import { buildIndex, encodeFeed, NOW } from "./test/fixtures.js";
import { startTestServer, stopTestServer, type TestServer } from "./test/http.js";

const southboundFeed = encodeFeed([
  {
    id: "000001",
    tripUpdate: {
      trip: { tripId: "T1-WKD_001_1..S03R", routeId: "1" },
      stopTimeUpdate: [
        { stopId: "101S", arrival: { time: NOW + 300 } },
        { stopId: "104S", arrival: { time: NOW + 600 } },
        { stopId: "127S", arrival: { time: NOW + 1500 } },
      ],
    },
  },
]);

const http = axios.create({ validateStatus: () => true });

describe("API routes", () => {
  const index = buildIndex();
  const fetchFeed = vi.fn<(line: LineGroup) => Promise<Uint8Array>>();
  const ctx: ServerContext = {
    scheduleIndex: index,
    fetchFeed,
    snapshots: new SnapshotStore(60_000, 10),
    now: () => NOW,
  };
  let testServer: TestServer;

  beforeAll(async () => {
    const app = express();
    registerRoutes(app, ctx);
    testServer = await startTestServer(app);
  });

  afterAll(async () => {
    await stopTestServer(testServer.server);
    index.close();
  });

  beforeEach(() => {
    fetchFeed.mockReset();
    fetchFeed.mockResolvedValue(southboundFeed);
  });

  const arrivals = (params: Record<string, string>) =>
    http.get(`${testServer.baseUrl}/api/arrivals`, { params });

  it("lists the line groups", async () => {
    const res = await http.get(`${testServer.baseUrl}/api/lines`);
    expect(res.status).toBe(200);
    expect(res.data.lines).toHaveLength(10);
    expect(res.data.lines[0]).toBe("1-2-3");
  });

  it("lists the stops of a line", async () => {
    const res = await http.get(`${testServer.baseUrl}/api/lines/1-2-3/stops`);
    expect(res.status).toBe(200);
    expect(res.data.stops.map((s: { stopName: string }) => s.stopName)).toEqual([
      "231 St",
      "Times Sq-42 St",
      "Van Cortlandt Park-242 St",
    ]);
  });

  it("rejects an unknown line", async () => {
    const res = await http.get(`${testServer.baseUrl}/api/lines/X-Y/stops`);
    expect(res.status).toBe(400);
  });

  it("returns arrivals and serves the trip path from the same snapshot", async () => {
    const res = await arrivals({ line: "1-2-3", from: "Van Cortlandt Park-242 St", to: "231 St" });

    expect(res.status).toBe(200);
    expect(res.data.status).toBe("ok");
    expect(res.data.arrivals).toEqual([
      {
        train: "1",
        from: "Van Cortlandt Park-242 St",
        to: "231 St",
        arrivalTime: "05:18:20 PM",
        arrivingIn: "5 min",
        destinationArrivalTime: "05:23:20 PM",
        status: "On Time",
        tripId: "T1-WKD_001_1..S03R",
        headsign: "South Ferry",
      },
    ]);
    expect(fetchFeed).toHaveBeenCalledWith("1-2-3");

    const snapshotId: string = res.data.snapshotId;
    const path = await http.get(
      `${testServer.baseUrl}/api/trips/${encodeURIComponent("T1-WKD_001_1..S03R")}/path`,
      { params: { snapshot: snapshotId } }
    );

    expect(path.status).toBe(200);
    expect(path.data.stops.map((s: { stopName: string }) => s.stopName)).toEqual([
      "Van Cortlandt Park-242 St",
      "231 St",
      "Times Sq-42 St",
    ]);
    expect(path.data.stops[2].arrivalTime).toBe("05:38:20 PM");
    expect(fetchFeed).toHaveBeenCalledTimes(1);
  });

  it("reports an empty search as no-results", async () => {
    const res = await arrivals({ line: "1-2-3", from: "231 St", to: "Van Cortlandt Park-242 St" });
    expect(res.status).toBe(200);
    expect(res.data.status).toBe("no-results");
    expect(res.data.arrivals).toEqual([]);
    expect(res.data.message).toBe("No upcoming trains found between selected stops.");
  });

  it("answers 404 for an unknown station", async () => {
    const res = await arrivals({ line: "1-2-3", from: "Atlantis", to: "231 St" });
    expect(res.status).toBe(404);
    expect(res.data.code).toBe("STOP_NOT_FOUND");
  });

  it("treats an unreadable feed as no trips", async () => {
    fetchFeed.mockResolvedValue(new Uint8Array([0x0a, 0x05, 0x01]));
    const res = await arrivals({ line: "1-2-3", from: "Van Cortlandt Park-242 St", to: "231 St" });

    expect(res.status).toBe(200);
    expect(res.data.status).toBe("feed-error");
    expect(res.data.snapshotId).toBeNull();
    expect(res.data.arrivals).toEqual([]);
  });

  it("answers 502 when the feed cannot be fetched", async () => {
    fetchFeed.mockRejectedValue(new FetchError("Error fetching feed: HTTP 503", "http://feed.test", 503));
    const res = await arrivals({ line: "L", from: "Van Cortlandt Park-242 St", to: "231 St" });

    expect(res.status).toBe(502);
    expect(res.data).toEqual({ error: "Error fetching feed: HTTP 503", code: "FETCH_FAILED" });
  });

  it("requires line, from and to", async () => {
    const res = await arrivals({ line: "1-2-3", from: "231 St" });
    expect(res.status).toBe(400);
    expect(fetchFeed).not.toHaveBeenCalled();
  });

  it("answers 404 for an unknown snapshot", async () => {
    const res = await http.get(`${testServer.baseUrl}/api/trips/abc/path`, { params: { snapshot: "gone" } });
    expect(res.status).toBe(404);
    expect(res.data.code).toBe("SNAPSHOT_NOT_FOUND");
  });

  it("reports index counts on the health check", async () => {
    const res = await http.get(`${testServer.baseUrl}/api/health`);
    expect(res.data.ready).toBe(true);
    expect(res.data.counts).toEqual({ routes: 5, trips: 5, stopTimes: 10, stops: 13 });
  });
});

describe("API routes before the schedule is loaded", () => {
  let testServer: TestServer;

  beforeAll(async () => {
    const app = express();
    registerRoutes(app, {
      fetchFeed: vi.fn<(line: LineGroup) => Promise<Uint8Array>>(),
      snapshots: new SnapshotStore(60_000, 10),
      now: () => NOW,
    });
    testServer = await startTestServer(app);
  });

  afterAll(async () => {
    await stopTestServer(testServer.server);
  });

  it("answers 503", async () => {
    const res = await http.get(`${testServer.baseUrl}/api/lines/1-2-3/stops`);
    expect(res.status).toBe(503);
  });
});

describe("API routes when the schedule failed to load", () => {
  let testServer: TestServer;

  beforeAll(async () => {
    const app = express();
    registerRoutes(app, {
      scheduleError: new FetchError("Static GTFS download failed: HTTP 404", "http://gtfs.test/google_transit.zip", 404),
      fetchFeed: vi.fn<(line: LineGroup) => Promise<Uint8Array>>(),
      snapshots: new SnapshotStore(60_000, 10),
      now: () => NOW,
    });
    testServer = await startTestServer(app);
  });

  afterAll(async () => {
    await stopTestServer(testServer.server);
  });

  it("answers 502 with the load error", async () => {
    const res = await http.get(`${testServer.baseUrl}/api/lines/1-2-3/stops`);
    expect(res.status).toBe(502);
    expect(res.data).toEqual({ error: "Static GTFS download failed: HTTP 404", code: "FETCH_FAILED" });
  });

  it("reports the load error on the health check", async () => {
    const res = await http.get(`${testServer.baseUrl}/api/health`);
    expect(res.data.ready).toBe(false);
    expect(res.data.error).toBe("Static GTFS download failed: HTTP 404");
  });
});
