/**
 * Runtime configuration from environment variables (.env loaded by the entry
 * point). Every value has a default; a malformed number falls back to its
 * default with a warning.
 */

import { TIMING, PROVISION_MAX_ATTEMPTS } from "./types";
import { isLogLevel } from "./utils/logger";
import type { LogLevel } from "./utils/logger";
import { resolveTimeZone } from "./services/MatchTimeParser";

export interface AppConfig {
  dataDir: string;
  logDir: string;
  logLevel: LogLevel;
  matchListUrl: string;

  discoveryIntervalMs: number;
  tickIntervalMs: number;
  preRollMs: number;
  maxLateStartMs: number;
  livePollIntervalMs: number;
  endCheckTimeoutMs: number;
  provisionMaxAttempts: number;
  provisionRetryDelayMs: number;
  trackerStopTimeoutMs: number;
  shutdownTimeoutMs: number;
  pageSettleMs: number;
  pageOperationTimeoutMs: number;
  defaultTimeZone: string;

  headless: boolean;
  chromiumPath?: string;

  apiPort: number;
  apiKey: string;
}

export const DEFAULT_MATCH_LIST_URL = "https://crex.live/fixtures/match-list";

type Env = Record<string, string | undefined>;

export function loadConfig(
  env: Env = process.env,
  onWarning: (message: string) => void = (message) => console.warn(message),
): AppConfig {
  const readNumber = (name: string, fallback: number, min: number): number => {
    const raw = env[name];
    if (raw === undefined || raw.trim() === "") return fallback;
    const value = Number(raw);
    if (!Number.isFinite(value) || value < min) {
      onWarning(`Invalid ${name}="${raw}", using default ${fallback}`);
      return fallback;
    }
    return value;
  };

  const readInteger = (name: string, fallback: number, min: number): number => {
    const value = readNumber(name, fallback, min);
    if (!Number.isInteger(value)) {
      onWarning(`Invalid ${name}="${env[name]}", using default ${fallback}`);
      return fallback;
    }
    return value;
  };

  const readString = (name: string, fallback: string): string => {
    const raw = env[name]?.trim();
    return raw ? raw : fallback;
  };

  const rawLevel = readString("LOG_LEVEL", "INFO").toUpperCase();
  let logLevel: LogLevel = "INFO";
  if (isLogLevel(rawLevel)) {
    logLevel = rawLevel;
  } else {
    onWarning(`Invalid LOG_LEVEL="${env.LOG_LEVEL}", using default INFO`);
  }

  let defaultTimeZone = readString("DEFAULT_TIMEZONE", "UTC");
  if (resolveTimeZone(defaultTimeZone) === null) {
    onWarning(`Unknown DEFAULT_TIMEZONE="${defaultTimeZone}", using default UTC`);
    defaultTimeZone = "UTC";
  }

  const chromiumPath = env.CHROMIUM_PATH?.trim();

  return {
    dataDir: readString("DATA_DIR", "./data"),
    logDir: readString("LOG_DIR", "./logs"),
    logLevel,
    matchListUrl: readString("MATCH_LIST_URL", DEFAULT_MATCH_LIST_URL),

    discoveryIntervalMs: readNumber("DISCOVERY_INTERVAL_MS", TIMING.DISCOVERY_INTERVAL, 1),
    tickIntervalMs: readNumber("TICK_INTERVAL_MS", TIMING.TICK_INTERVAL, 1),
    preRollMs: readNumber("PRE_ROLL_MS", TIMING.PRE_ROLL, 0),
    maxLateStartMs: readNumber("MAX_LATE_START_MS", TIMING.MAX_LATE_START, 0),
    livePollIntervalMs: readNumber("LIVE_POLL_INTERVAL_MS", TIMING.LIVE_POLL_INTERVAL, 1),
    endCheckTimeoutMs: readNumber("END_CHECK_TIMEOUT_MS", TIMING.END_CHECK_TIMEOUT, 1),
    provisionMaxAttempts: readInteger("PROVISION_MAX_ATTEMPTS", PROVISION_MAX_ATTEMPTS, 1),
    provisionRetryDelayMs: readNumber("PROVISION_RETRY_DELAY_MS", TIMING.PROVISION_RETRY_DELAY, 0),
    trackerStopTimeoutMs: readNumber("TRACKER_STOP_TIMEOUT_MS", TIMING.TRACKER_STOP_TIMEOUT, 0),
    shutdownTimeoutMs: readNumber("SHUTDOWN_TIMEOUT_MS", TIMING.SHUTDOWN_TIMEOUT, 0),
    pageSettleMs: readNumber("PAGE_SETTLE_MS", 5_000, 0),
    pageOperationTimeoutMs: readNumber("PAGE_OPERATION_TIMEOUT_MS", TIMING.PAGE_OPERATION_TIMEOUT, 1),
    defaultTimeZone,

    headless: readString("HEADLESS", "true").toLowerCase() !== "false",
    chromiumPath: chromiumPath ? chromiumPath : undefined,

    apiPort: readInteger("API_PORT", 5000, 0),
    apiKey: readString("API_KEY", ""),
  };
}
