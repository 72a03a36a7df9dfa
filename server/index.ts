import "dotenv/config";
import express from "express";
import { createServer } from "http";
import { registerRoutes } from "./routes.js";
import { loadServerConfig } from "./config.js";
import { createServerContext } from "./lib/context.js";
import { ArrivalsError, FetchError, errorMessage } from "./lib/errors.js";
import { loadScheduleIndex } from "./db/gtfs-loader.js";

async function startServer() {
  const config = loadServerConfig();
  const context = createServerContext(config);

  const app = express();
  const server = createServer(app);

  registerRoutes(app, context);

  // Index the static schedule in the background; routes answer 503 until it is ready, 502 if it fails
  loadScheduleIndex(config.staticGtfsUrl, config.requestTimeoutMs)
    .then(index => {
      context.scheduleIndex = index;
      console.log("✅ Static schedule ready");
    })
    .catch(error => {
      console.error("❌ [GTFS] Failed to load static schedule:", errorMessage(error));
      context.scheduleError = error instanceof ArrivalsError
        ? error
        : new FetchError(`Failed to load static schedule: ${errorMessage(error)}`, config.staticGtfsUrl, undefined, { cause: error });
      console.error("   Restart the server to try again");
    });

  server.listen(config.port, () => {
    console.log(`✅ Backend server running on http://localhost:${config.port}/`);
    console.log(`📡 API endpoints available at http://localhost:${config.port}/api/*`);
  });

  server.on("error", (error: NodeJS.ErrnoException) => {
    if (error.code === "EADDRINUSE") {
      console.error(`❌ Port ${config.port} is already in use.`);
      console.error(`   Use a different port: PORT=3002 npm start`);
      process.exit(1);
    } else {
      console.error("Server error:", error);
    }
  });
}

startServer().catch((error) => {
  console.error("❌ Fatal error starting server:", error);
  process.exit(1);
});
