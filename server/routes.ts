import express from "express";
import { LINE_GROUPS, isLineGroup } from "@shared/constants";
import type { ArrivalsResponse } from "@shared/types";
import type { ServerContext } from "./lib/context.js";
import { ArrivalsError, DecodeError, errorMessage } from "./lib/errors.js";
import { toArrivalRow, toTripPathRow } from "./lib/format.js";
import { matchArrivals, sortBySoonest, stopsForTrip } from "./db/arrival-matcher.js";
import { stopsForLine } from "./db/line-stops.js";
import { decodeFeed, type FeedSnapshot } from "./db/realtime-feed.js";
import type { ScheduleIndex } from "./db/schedule-index.js";

function sendError(res: express.Response, error: unknown, label: string) {
  if (error instanceof ArrivalsError) {
    console.warn(`⚠️  [API] ${label}: ${error.message}`);
    res.status(error.httpStatus).json({ error: error.message, code: error.code });
    return;
  }
  console.error(`❌ [API] ${label}:`, errorMessage(error));
  res.status(500).json({ error: `Failed to ${label}` });
}

export function registerRoutes(app: express.Express, ctx: ServerContext) {
  const requireIndex = (res: express.Response): ScheduleIndex | undefined => {
    if (!ctx.scheduleIndex && ctx.scheduleError) {
      res.status(ctx.scheduleError.httpStatus).json({ error: ctx.scheduleError.message, code: ctx.scheduleError.code });
      return undefined;
    }
    if (!ctx.scheduleIndex) {
      res.status(503).json({ error: "Static schedule is still loading" });
      return undefined;
    }
    return ctx.scheduleIndex;
  };

  app.get("/api/health", (_req, res) => {
    const index = ctx.scheduleIndex;
    res.json({
      ready: Boolean(index),
      loadedAt: index ? index.loadedAt.toISOString() : null,
      counts: index ? index.tableCounts() : null,
      error: ctx.scheduleError ? ctx.scheduleError.message : null,
      snapshots: ctx.snapshots.size,
      serverTime: new Date().toISOString(),
    });
  });

  app.get("/api/lines", (_req, res) => {
    res.json({ lines: LINE_GROUPS });
  });

  app.get("/api/lines/:line/stops", (req, res) => {
    const { line } = req.params;
    if (!isLineGroup(line)) {
      return res.status(400).json({ error: "Invalid line" });
    }
    const index = requireIndex(res);
    if (!index) return;

    try {
      const stops = stopsForLine(index, line);
      res.json({ line, stops });
    } catch (error) {
      sendError(res, error, "load stops");
    }
  });

  app.get("/api/arrivals", async (req, res) => {
    const { line, from, to } = req.query;
    if (typeof line !== "string" || typeof from !== "string" || typeof to !== "string" || !from || !to) {
      return res.status(400).json({ error: "Missing required parameters: line, from, to" });
    }
    if (!isLineGroup(line)) {
      return res.status(400).json({ error: "Invalid line" });
    }
    const index = requireIndex(res);
    if (!index) return;

    let snapshot: FeedSnapshot;
    try {
      const bytes = await ctx.fetchFeed(line);
      snapshot = decodeFeed(bytes, ctx.now());
      console.log(`[REALTIME] Parsed ${snapshot.entities.length} entities from ${line} feed`);
    } catch (error) {
      if (error instanceof DecodeError) {
        // Unreadable feed: report it and carry on with no trips for this cycle
        console.warn(`⚠️  [REALTIME] ${error.message}`);
        const body: ArrivalsResponse = {
          line,
          snapshotId: null,
          status: "feed-error",
          message: error.message,
          arrivals: [],
        };
        return res.json(body);
      }
      return sendError(res, error, "fetch realtime feed");
    }

    try {
      const records = sortBySoonest(matchArrivals(index, snapshot, from, to, ctx.now()));
      const snapshotId = ctx.snapshots.save(line, snapshot);
      const body: ArrivalsResponse = {
        line,
        snapshotId,
        status: records.length > 0 ? "ok" : "no-results",
        message: records.length > 0 ? undefined : "No upcoming trains found between selected stops.",
        arrivals: records.map(record => toArrivalRow(record)),
      };
      res.json(body);
    } catch (error) {
      sendError(res, error, "match arrivals");
    }
  });

  app.get("/api/trips/:tripId/path", (req, res) => {
    const { tripId } = req.params;
    const { snapshot: snapshotId } = req.query;
    if (typeof snapshotId !== "string" || !snapshotId) {
      return res.status(400).json({ error: "Missing snapshot" });
    }
    const index = requireIndex(res);
    if (!index) return;

    try {
      const stored = ctx.snapshots.require(snapshotId);
      const stops = stopsForTrip(index, tripId, stored.snapshot, ctx.now());
      res.json({
        tripId,
        line: stored.line,
        snapshotId,
        stops: stops.map(stop => toTripPathRow(stop)),
      });
    } catch (error) {
      sendError(res, error, "load trip path");
    }
  });
}
