#!/usr/bin/env node
/**
 * Entry point for the live match tracker.
 *
 * Usage:
 *   node dist/run-match-tracker.js [--data-dir PATH]
 *
 * Configuration comes from the environment (.env is loaded first); see
 * .env.example for every variable and its default.
 */

import * as dotenv from "dotenv";
import { loadConfig } from "./config";
import { MatchTrackerApp } from "./MatchTrackerApp";
import { configureLogging, createLogger } from "./utils/logger";

dotenv.config();

const log = createLogger("Main");

async function main() {
  const config = loadConfig(process.env, (message) => log.warn(message));

  const args = process.argv.slice(2);
  for (let i = 0; i < args.length; i++) {
    if ((args[i] === "--data-dir" || args[i] === "-d") && args[i + 1]) {
      config.dataDir = args[++i];
    } else if (args[i] === "--help" || args[i] === "-h") {
      console.log(`
Live Match Tracker

Usage:
  node dist/run-match-tracker.js [options]

Options:
  --data-dir, -d <PATH>   Data directory. Default: ${config.dataDir}
  --help, -h              Show this help

Output:
  Data: <data-dir>/match-list.json, <data-dir>/matches/<id>/...
  Logs: <log-dir>/match_tracker_YYYY-MM-DD.log
      `);
      process.exit(0);
    }
  }

  configureLogging({ level: config.logLevel, logDir: config.logDir });
  log.info(`Data directory: ${config.dataDir}`);
  log.info(`Match list: ${config.matchListUrl}`);

  const app = new MatchTrackerApp(config);

  const shutdown = (signal: string) => {
    log.info(`Received ${signal}, shutting down`);
    app
      .stop()
      .then(() => process.exit(0))
      .catch((err) => {
        log.error("Error during shutdown", err);
        process.exit(1);
      });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));

  await app.start();
}

main().catch((err) => {
  log.error("Fatal error", err);
  process.exit(1);
});
